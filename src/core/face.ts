/**
 * Triangular mesh face.
 *
 * Construction normalizes the vertex order to counter-clockwise as seen from
 * the outward direction:
 * 1. u = b - a, v = c - a, n = cross(u, v)
 * 2. map a, b, c into the UV frame (origin a, U axis u, outward reference)
 * 3. if cross(uv(b) - uv(a), uv(c) - uv(a)) < 0, swap b and c
 * 4. rebuild edges and normal from the final order
 *
 * Vertex mutations rebuild edges and normal but do not re-run step 3.
 */

import { Vec2, Vec3 } from '../interface';
import type { InputKind, SpatialInput, SpatialVector, Triangle } from '../interface';
import { getOptions } from '../config';
import { DegenerateGeometryError, TopologyError, TypeMismatchError } from '../utils/errors';
import { cross2, pointInTriangle } from '../utils/geo2d';
import { distancePointPlane, mapXyzToUv } from '../utils/geo3d';
import { createLogger } from '../utils/log';
import { checkType, COORDINATE_KINDS, isSpatialInput, kindOf, toVec3 } from '../utils/validate';
import { Edge } from './edge';
import { Plane } from './plane';
import { Vertex } from './vertex';

const log = createLogger('Face');

const VERTEX_OR_EDGE: readonly InputKind[] = [...COORDINATE_KINDS, 'edge'];

export interface FaceOptions {
    /**
     * Direction the face should point towards. Defaults to the positive
     * world axis along which the raw normal has its largest component.
     */
    outward?: SpatialVector;
}

type Corners = [Vec3, Vec3, Vec3];

/**
 * Positive unit axis matching the dominant component of `n`; the first axis wins ties.
 */
export function referenceAxis(n: Vec3): Vec3 {
    const abs = [Math.abs(n.x), Math.abs(n.y), Math.abs(n.z)];
    let k = 0;
    for (let i = 1; i < 3; i++)
        if (abs[i] > abs[k]) k = i;

    const axis = new Vec3();
    axis.setComponent(k, 1);
    return axis;
}

/**
 * Reorder (a, b, c) so that it winds counter-clockwise around `outward`.
 * Throws DegenerateGeometryError for collinear corners.
 */
export function canonicalWinding(a: Vec3, b: Vec3, c: Vec3, outward?: SpatialVector): Corners {
    const u = b.clone().sub(a);
    const v = c.clone().sub(a);
    const n = u.clone().cross(v);
    if (n.lengthSq() === 0)
        throw new DegenerateGeometryError('Face vertices are collinear');

    const ref = outward === undefined ? referenceAxis(n) : toVec3(outward);
    const [uvA, uvB, uvC] = [a, b, c].map((p) => mapXyzToUv(a, u, ref, p));
    const ab = new Vec2().subVectors(uvB, uvA);
    const ac = new Vec2().subVectors(uvC, uvA);

    if (cross2(ab, ac) < 0) {
        log.debug('clockwise input, swapping vertexB and vertexC');
        return [a, c, b];
    }
    return [a, b, c];
}

function nearlyEqual(p: Vec3, q: Vec3, tolerance: number): boolean {
    return Math.abs(p.x - q.x) <= tolerance
        && Math.abs(p.y - q.y) <= tolerance
        && Math.abs(p.z - q.z) <= tolerance;
}

/**
 * Corners of the face spanned by two edges meeting in exactly one endpoint.
 * The free endpoint of `first` becomes vertexA; `second` supplies vertexB and
 * vertexC in its own order.
 */
export function cornersFromEdges(first: Edge, second: Edge, tolerance: number): Corners {
    const p = [first.vertexA.toVector(), first.vertexB.toVector()];
    const q = [second.vertexA.toVector(), second.vertexB.toVector()];

    const shared = p.map((pi) => q.some((qj) => nearlyEqual(pi, qj, tolerance)));
    if (shared[0] && shared[1])
        throw new TopologyError('Edges share both endpoints');
    if (!shared[0] && !shared[1])
        throw new TopologyError('Edges share no endpoint');

    const free = shared[0] ? p[1] : p[0];
    return [free, q[0], q[1]];
}

interface FaceInit {
    corners: Corners;
    options: FaceOptions;
}

function resolveArgs(
    first: SpatialInput | Edge,
    second: SpatialInput | Edge,
    third: SpatialInput | FaceOptions | undefined,
    options: FaceOptions | undefined
): FaceInit {
    checkType(VERTEX_OR_EDGE, first, 'first');
    checkType(VERTEX_OR_EDGE, second, 'second');

    if (first instanceof Edge) {
        if (!(second instanceof Edge))
            throw new TypeMismatchError('second', ['edge'], kindOf(second));
        if (isSpatialInput(third))
            throw new TypeMismatchError('third', ['options'], kindOf(third));
        return {
            corners: cornersFromEdges(first, second, getOptions().endpointTolerance),
            options: third ?? {},
        };
    }
    if (second instanceof Edge) {
        if (isSpatialInput(third))
            throw new TypeMismatchError('third', ['options'], kindOf(third));
        return {
            corners: [toVec3(first), second.vertexA.toVector(), second.vertexB.toVector()],
            options: third ?? {},
        };
    }
    if (!isSpatialInput(third))
        throw new TypeMismatchError('third', COORDINATE_KINDS, kindOf(third));
    return {
        corners: [toVec3(first), toVec3(second), toVec3(third)],
        options: options ?? {},
    };
}

interface FaceState {
    a: Vec3;
    b: Vec3;
    c: Vec3;
    edges: [Edge, Edge, Edge];
    vectorU: Vec3;
    vectorV: Vec3;
    normal: Vec3;
}

function build(a: Vec3, b: Vec3, c: Vec3): FaceState {
    const vectorU = b.clone().sub(a);
    const vectorV = c.clone().sub(a);
    const normal = vectorU.clone().cross(vectorV);
    if (normal.lengthSq() === 0)
        log.warn('face is degenerate, vertices are collinear');
    return {
        a, b, c,
        edges: [new Edge(a, b), new Edge(b, c), new Edge(c, a)],
        vectorU,
        vectorV,
        normal,
    };
}

export class Face {
    readonly kind = 'face';
    private state: FaceState;

    constructor(a: SpatialInput, b: SpatialInput, c: SpatialInput, options?: FaceOptions);
    constructor(first: Edge, second: Edge, options?: FaceOptions);
    constructor(vertex: SpatialInput, edge: Edge, options?: FaceOptions);
    constructor(
        first: SpatialInput | Edge,
        second: SpatialInput | Edge,
        third?: SpatialInput | FaceOptions,
        options?: FaceOptions
    ) {
        const init = resolveArgs(first, second, third, options);
        const [a, b, c] = canonicalWinding(...init.corners, init.options.outward);
        this.state = build(a, b, c);
    }

    static fromVertices(a: SpatialInput, b: SpatialInput, c: SpatialInput, options?: FaceOptions): Face {
        return new Face(a, b, c, options);
    }

    static fromEdges(first: Edge, second: Edge, options?: FaceOptions): Face {
        return new Face(first, second, options);
    }

    static fromVertexAndEdge(vertex: SpatialInput, edge: Edge, options?: FaceOptions): Face {
        return new Face(vertex, edge, options);
    }

    get vertexA(): Vertex { return new Vertex(this.state.a); }
    set vertexA(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'vertexA');
        this.state = build(toVec3(value), this.state.b, this.state.c);
    }

    get vertexB(): Vertex { return new Vertex(this.state.b); }
    set vertexB(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'vertexB');
        this.state = build(this.state.a, toVec3(value), this.state.c);
    }

    get vertexC(): Vertex { return new Vertex(this.state.c); }
    set vertexC(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'vertexC');
        this.state = build(this.state.a, this.state.b, toVec3(value));
    }

    get vertices(): [Vertex, Vertex, Vertex] {
        return [this.vertexA, this.vertexB, this.vertexC];
    }

    /** a -> b */
    get edgeA(): Edge { return this.state.edges[0].clone(); }
    set edgeA(edge: Edge) {
        checkType(['edge'], edge, 'edgeA');
        this.state = build(edge.vertexA.toVector(), edge.vertexB.toVector(), this.state.c);
    }

    /** b -> c */
    get edgeB(): Edge { return this.state.edges[1].clone(); }
    set edgeB(edge: Edge) {
        checkType(['edge'], edge, 'edgeB');
        this.state = build(this.state.a, edge.vertexA.toVector(), edge.vertexB.toVector());
    }

    /** c -> a */
    get edgeC(): Edge { return this.state.edges[2].clone(); }
    set edgeC(edge: Edge) {
        checkType(['edge'], edge, 'edgeC');
        this.state = build(edge.vertexB.toVector(), this.state.b, edge.vertexA.toVector());
    }

    get edges(): [Edge, Edge, Edge] {
        return [this.edgeA, this.edgeB, this.edgeC];
    }

    get vectorU(): Vec3 { return this.state.vectorU.clone(); }
    get vectorV(): Vec3 { return this.state.vectorV.clone(); }
    get normal(): Vec3 { return this.state.normal.clone(); }

    get area(): number {
        return this.state.normal.length() / 2;
    }

    get centroid(): Vec3 {
        return this.state.a.clone().add(this.state.b).add(this.state.c).divideScalar(3);
    }

    /**
     * Reverse the winding by swapping vertexB and vertexC.
     */
    flip(): this {
        this.state = build(this.state.a, this.state.c, this.state.b);
        return this;
    }

    plane(): Plane {
        return new Plane(this.state.a, this.state.b, this.state.c, 'points');
    }

    /**
     * Coordinates of `point` in the face's own UV frame
     * (origin vertexA, U along edgeA, V towards vertexC).
     */
    toUV(point: SpatialInput): Vec2 {
        return mapXyzToUv(this.state.a, this.state.vectorU, this.state.normal, point);
    }

    /**
     * Whether `point` lies on the face plane and inside the triangle, boundary included.
     */
    containsPoint(point: SpatialInput, tolerance: number = getOptions().containsTolerance): boolean {
        const corners: Triangle<Vec3> = [this.state.a, this.state.b, this.state.c];
        if (distancePointPlane(point, corners) > tolerance)
            return false;

        const uv: Triangle<Vec2> = [this.toUV(corners[0]), this.toUV(corners[1]), this.toUV(corners[2])];
        return pointInTriangle(uv, this.toUV(point));
    }
}
