import { Vec3 } from '@/interface';
import { Point } from '@/core/point';
import { Vertex } from '@/core/vertex';
import { Edge } from '@/core/edge';
import { DimensionMismatchError, TypeMismatchError } from '@/utils/errors';

// ---------------------------------------------------------------------------
// Point
// ---------------------------------------------------------------------------
describe('Point', () => {
    it('is built from scalars, arrays or vectors', () => {
        expect(new Point(1, 2, 3).coords).toEqual([1, 2, 3]);
        expect(new Point([1, 2, 3]).coords).toEqual([1, 2, 3]);
        expect(new Point(new Vec3(1, 2, 3)).coords).toEqual([1, 2, 3]);
        expect(new Point(new Vertex(1, 2, 3)).coords).toEqual([1, 2, 3]);
    });

    it('rejects coordinates of the wrong dimension', () => {
        expect(() => new Point([1, 2])).toThrow(DimensionMismatchError);
        expect(() => new Point([1, 2, 3, 4])).toThrow(DimensionMismatchError);
    });

    it('rejects values that carry no coordinates', () => {
        expect(() => Reflect.construct(Point, [new Edge([0, 0, 0], [1, 0, 0])])).toThrow(TypeMismatchError);
        expect(() => Reflect.construct(Point, [['a', 'b', 'c']])).toThrow(TypeMismatchError);
        expect(() => Reflect.construct(Point, [null])).toThrow("Argument 'coords' takes vector or point or vertex, got null");
    });

    it('rejects a vector mixed with scalars', () => {
        expect(() => Reflect.construct(Point, [[1, 2, 3], 4])).toThrow(TypeMismatchError);
    });

    it('keeps components and coordinate vector in sync', () => {
        const p = new Point(1, 2, 3);
        p.x = 10;
        expect(p.coords).toEqual([10, 2, 3]);

        p.coords = [4, 5, 6];
        expect([p.x, p.y, p.z]).toEqual([4, 5, 6]);

        p.z = -1;
        expect(p.toVector().toArray()).toEqual([4, 5, -1]);
    });

    it('leaves coordinates untouched when a setter fails', () => {
        const p = new Point(1, 2, 3);
        expect(() => { p.coords = [7, 8]; }).toThrow(DimensionMismatchError);
        expect(p.coords).toEqual([1, 2, 3]);
    });

    it('does not share state with its input or outputs', () => {
        const source = new Vec3(1, 2, 3);
        const p = new Point(source);
        source.x = 100;
        p.toVector().y = 100;
        p.coords[2] = 100;
        expect(p.coords).toEqual([1, 2, 3]);
    });

    it('compares within a tolerance', () => {
        const p = new Point(1, 2, 3);
        expect(p.equals([1, 2, 3])).toBe(true);
        expect(p.equals([1, 2, 3.001])).toBe(false);
        expect(p.equals([1, 2, 3.001], 0.01)).toBe(true);
    });

    it('clones into an independent point', () => {
        const p = new Point(1, 2, 3);
        const q = p.clone();
        q.x = 9;
        expect(p.x).toBe(1);
    });
});
