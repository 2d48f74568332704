import { Vec2 } from '@/interface';
import { UVLine, UVPoint } from '@/core/uv';
import { Point } from '@/core/point';
import { DimensionMismatchError, InvalidModeError, TypeMismatchError } from '@/utils/errors';
import { expectVec2 } from '../helpers/vectors';

// ---------------------------------------------------------------------------
// UVPoint
// ---------------------------------------------------------------------------
describe('UVPoint', () => {
    it('stores two coordinates', () => {
        const p = new UVPoint(1, 2);
        expect(p.kind).toBe('uvpoint');
        expect(p.coords).toEqual([1, 2]);
        expect(p.dimension).toBe(2);
    });

    it('keeps u/v in sync with the coordinate vector', () => {
        const p = new UVPoint([1, 2]);
        p.u = 3;
        expect(p.coords).toEqual([3, 2]);
        p.coords = new Vec2(5, 6);
        expect([p.u, p.v]).toEqual([5, 6]);
    });

    it('compares within a tolerance', () => {
        const p = new UVPoint(1, 2);
        expect(p.equals(new UVPoint(1, 2))).toBe(true);
        expect(p.equals([1, 2.001])).toBe(false);
        expect(p.equals(new Vec2(1, 2.001), 0.01)).toBe(true);
    });

    it('clones into an independent point', () => {
        const p = new UVPoint(1, 2);
        const q = p.clone();
        q.v = 9;
        expect(q).toBeInstanceOf(UVPoint);
        expect(p.coords).toEqual([1, 2]);
        expect(q.coords).toEqual([1, 9]);
    });

    it('rejects a spatial point entity', () => {
        expect(() => Reflect.construct(UVPoint, [new Point(1, 2, 3)])).toThrow(TypeMismatchError);
    });

    it('rejects spatial coordinates', () => {
        expect(() => new UVPoint([1, 2, 3])).toThrow(DimensionMismatchError);
        const p = new UVPoint(1, 2);
        expect(() => { p.coords = [1, 2, 3]; }).toThrow(DimensionMismatchError);
        expect(p.coords).toEqual([1, 2]);
    });
});

// ---------------------------------------------------------------------------
// UVLine
// ---------------------------------------------------------------------------
describe('UVLine', () => {
    it('derives the vector in point mode', () => {
        const line = new UVLine([0, 0], [2, 2]);
        expectVec2(line.vector, [2, 2]);
        expectVec2(line.point(0.5), [1, 1]);
    });

    it('derives pointB in vector mode', () => {
        const line = new UVLine(new UVPoint(1, 1), [0, 3], 'VECTOR');
        expectVec2(line.pointB, [1, 4]);
    });

    it('takes only raw vectors as direction', () => {
        expect(() => new UVLine([0, 0], new UVPoint(1, 0), 'vector')).toThrow(TypeMismatchError);
    });

    it('rejects unknown modes and spatial input', () => {
        expect(() => new UVLine([0, 0], [1, 0], 'normal')).toThrow(InvalidModeError);
        expect(() => new UVLine([0, 0, 0], [1, 0])).toThrow(DimensionMismatchError);
    });

    it('keeps pointB == pointA + vector through every setter', () => {
        const line = new UVLine([0, 0], [2, 2]);

        line.pointA = [1, 0];
        expectVec2(line.vector, [1, 2]);
        expectVec2(line.pointB, [2, 2]);

        line.vector = [0, 1];
        expectVec2(line.pointB, [1, 1]);

        line.pointB = new UVPoint(4, 4);
        expectVec2(line.vector, [3, 4]);
    });
});
