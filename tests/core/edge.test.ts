import { Edge } from '@/core/edge';
import { Line } from '@/core/line';
import { Vertex } from '@/core/vertex';
import { DimensionMismatchError, RangeViolationError, TypeMismatchError } from '@/utils/errors';
import { expectVec3 } from '../helpers/vectors';

describe('Edge', () => {
    it('is built from two vertices', () => {
        const edge = new Edge(new Vertex(0, 0, 0), new Vertex(2, 0, 0));
        expect(edge.kind).toBe('edge');
        expect(edge.length).toBe(2);
        expectVec3(edge.vector, [2, 0, 0]);
    });

    it('is built from a vertex and a direction in vector mode', () => {
        const edge = new Edge([1, 0, 0], [0, 2, 0], 'vector');
        expect(edge.vertexB.coords).toEqual([1, 2, 0]);
    });

    it('rejects a vertex as direction in vector mode', () => {
        expect(() => new Edge([0, 0, 0], new Vertex(1, 0, 0), 'vector')).toThrow(TypeMismatchError);
    });

    it('returns vertices that do not alias its state', () => {
        const edge = new Edge([0, 0, 0], [1, 0, 0]);
        const a = edge.vertexA;
        a.x = 10;
        expect(a).toBeInstanceOf(Vertex);
        expect(edge.vertexA.coords).toEqual([0, 0, 0]);
    });

    it('keeps vertexB == vertexA + vector through every setter', () => {
        const edge = new Edge([0, 0, 0], [1, 0, 0]);

        edge.vertexB = new Vertex(0, 3, 0);
        expectVec3(edge.vector, [0, 3, 0]);

        edge.vertexA = [0, 1, 0];
        expectVec3(edge.vector, [0, 2, 0]);

        edge.vector = [1, 1, 1];
        expect(edge.vertexB.coords).toEqual([1, 2, 1]);
    });

    it('leaves the edge unchanged when a setter rejects its input', () => {
        const edge = new Edge([0, 0, 0], [1, 0, 0]);
        expect(() => { edge.vertexA = [1, 1]; }).toThrow(DimensionMismatchError);
        expect(edge.vertexA.coords).toEqual([0, 0, 0]);
        expectVec3(edge.vector, [1, 0, 0]);
    });

    describe('point', () => {
        const edge = new Edge([1, 1, 1], [3, 1, 1]);

        it('returns the end points at t = 0 and t = 1', () => {
            expect(edge.point(0).toArray()).toEqual([1, 1, 1]);
            expect(edge.point(1).toArray()).toEqual([3, 1, 1]);
        });

        it('interpolates between the end points', () => {
            expectVec3(edge.point(0.25), [1.5, 1, 1]);
            expectVec3(edge.midpoint, [2, 1, 1]);
        });

        it('rejects parameters outside [0, 1]', () => {
            expect(() => edge.point(1.5)).toThrow(RangeViolationError);
            expect(() => edge.point(-0.1)).toThrow(RangeViolationError);
        });
    });

    it('extends to an independent line', () => {
        const edge = new Edge([0, 0, 0], [1, 0, 0]);
        const line = edge.toLine();
        expect(line).toBeInstanceOf(Line);
        expectVec3(line.point(3), [3, 0, 0]);

        line.pointB = [0, 5, 0];
        expect(edge.vertexB.coords).toEqual([1, 0, 0]);
    });

    it('clones into an independent edge', () => {
        const edge = new Edge([0, 0, 0], [1, 0, 0]);
        const copy = edge.clone();
        copy.vertexB = [0, 0, 2];
        expect(edge.length).toBe(1);
        expect(copy.length).toBe(2);
    });
});
