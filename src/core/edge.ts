import { Vec3 } from '../interface';
import type { SpatialInput, SpatialVector } from '../interface';
import { checkRange } from '../utils/validate';
import { Line } from './line';
import { Vertex } from './vertex';

/**
 * Mesh edge: the finite part of a line between vertexA and vertexB.
 * Built from two vertices, or from a vertex and a direction in `vector` mode.
 */
export class Edge {
    readonly kind = 'edge';
    private readonly line: Line;

    constructor(v0: SpatialInput, v1: SpatialInput, mode: string = 'point') {
        this.line = new Line(v0, v1, mode);
    }

    get vertexA(): Vertex { return new Vertex(this.line.pointA); }
    set vertexA(value: SpatialInput) { this.line.pointA = value; }

    get vertexB(): Vertex { return new Vertex(this.line.pointB); }
    set vertexB(value: SpatialInput) { this.line.pointB = value; }

    get vector(): Vec3 { return this.line.vector; }
    set vector(value: SpatialVector) { this.line.vector = value; }

    get length(): number {
        return this.line.length;
    }

    get midpoint(): Vec3 {
        return this.point(0.5);
    }

    /**
     * Interpolate between the end points; t = 0 is vertexA, t = 1 is vertexB.
     */
    point(t: number): Vec3 {
        checkRange(0, 1, t);
        return this.line.pointA
            .multiplyScalar(1 - t)
            .addScaledVector(this.line.pointB, t);
    }

    /** The unbounded line through this edge. */
    toLine(): Line {
        return this.line.clone();
    }

    clone(): Edge {
        return new Edge(this.line.pointA, this.line.pointB);
    }
}
