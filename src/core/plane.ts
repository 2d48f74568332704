import { Vec3 } from '../interface';
import type { InputKind, PlaneMode, SpatialInput, SpatialVector } from '../interface';
import { getOptions } from '../config';
import { distancePointPlane, intersectionLinePlane } from '../utils/geo3d';
import { createLogger } from '../utils/log';
import { checkDimension, checkType, COORDINATE_KINDS, parseMode, toVec3 } from '../utils/validate';
import type { Line } from './line';
import { Point } from './point';

export const PLANE_MODES: Readonly<Record<string, PlaneMode>> = {
    point: 'points',
    points: 'points',
    vector: 'vector',
    normal: 'normal',
};

const VECTOR_ONLY: readonly InputKind[] = ['vector'];

const log = createLogger('Plane');

interface PlaneState {
    pointA: Vec3;
    pointB: Vec3;
    pointC: Vec3;
    vectorU: Vec3;
    vectorV: Vec3;
    normal: Vec3;
}

function fromPoints(a: Vec3, b: Vec3, c: Vec3): PlaneState {
    const u = b.clone().sub(a);
    const v = c.clone().sub(a);
    return { pointA: a, pointB: b, pointC: c, vectorU: u, vectorV: v, normal: normalOf(u, v) };
}

function fromVectors(a: Vec3, u: Vec3, v: Vec3): PlaneState {
    return {
        pointA: a,
        pointB: a.clone().add(u),
        pointC: a.clone().add(v),
        vectorU: u,
        vectorV: v,
        normal: normalOf(u, v),
    };
}

/**
 * Second in-plane vector for `normal` mode: cross(normal, u).
 */
function fromNormal(a: Vec3, u: Vec3, normal: Vec3): PlaneState {
    return fromVectors(a, u, normal.clone().cross(u));
}

function normalOf(u: Vec3, v: Vec3): Vec3 {
    const n = u.clone().cross(v);
    if (n.lengthSq() === 0)
        log.debug('defining vectors are parallel, normal is zero');
    return n;
}

/**
 * Plane in 3D space. Three equivalent representations are accepted and
 * normalized to base point + two in-plane vectors:
 * - `points`: three points on the plane
 * - `vector`: base point and two non-parallel in-plane vectors
 * - `normal`: base point, one in-plane vector and the plane normal
 *
 * normal == cross(vectorU, vectorV) after every mutation.
 */
export class Plane {
    readonly kind = 'plane';
    private state: PlaneState;

    constructor(c0: SpatialInput, c1: SpatialInput, c2: SpatialInput, mode: string = 'points') {
        const m = parseMode(mode, PLANE_MODES);
        const rest = m === 'points' ? COORDINATE_KINDS : VECTOR_ONLY;
        checkType(COORDINATE_KINDS, c0, 'constraint_0');
        checkType(rest, c1, 'constraint_1');
        checkType(rest, c2, 'constraint_2');
        checkDimension(3, c0, c1, c2);

        const [a, b, c] = [toVec3(c0), toVec3(c1), toVec3(c2)];
        if (m === 'points')
            this.state = fromPoints(a, b, c);
        else
            this.state = m === 'vector'
                ? fromVectors(a, b, c)
                : fromNormal(a, b, c);
    }

    get pointA(): Vec3 { return this.state.pointA.clone(); }
    set pointA(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'pointA');
        this.state = fromPoints(toVec3(value), this.state.pointB, this.state.pointC);
    }

    get pointB(): Vec3 { return this.state.pointB.clone(); }
    set pointB(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'pointB');
        this.state = fromPoints(this.state.pointA, toVec3(value), this.state.pointC);
    }

    get pointC(): Vec3 { return this.state.pointC.clone(); }
    set pointC(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'pointC');
        this.state = fromPoints(this.state.pointA, this.state.pointB, toVec3(value));
    }

    get vectorU(): Vec3 { return this.state.vectorU.clone(); }
    set vectorU(value: SpatialVector) {
        checkType(VECTOR_ONLY, value, 'vectorU');
        this.state = fromVectors(this.state.pointA, toVec3(value), this.state.vectorV);
    }

    get vectorV(): Vec3 { return this.state.vectorV.clone(); }
    set vectorV(value: SpatialVector) {
        checkType(VECTOR_ONLY, value, 'vectorV');
        this.state = fromVectors(this.state.pointA, this.state.vectorU, toVec3(value));
    }

    get normal(): Vec3 { return this.state.normal.clone(); }
    /** Rebuilds the plane in `normal` mode around pointA and vectorU. */
    set normal(value: SpatialVector) {
        checkType(VECTOR_ONLY, value, 'normal');
        this.state = fromNormal(this.state.pointA, this.state.vectorU, toVec3(value));
    }

    /**
     * Point on the plane: pointA + scaleU * vectorU + scaleV * vectorV
     */
    point(scaleU: number, scaleV: number): Vec3 {
        return this.state.pointA.clone()
            .addScaledVector(this.state.vectorU, scaleU)
            .addScaledVector(this.state.vectorV, scaleV);
    }

    distanceTo(point: SpatialInput): number {
        return distancePointPlane(point, [this.state.pointA, this.state.pointB, this.state.pointC]);
    }

    contains(point: SpatialInput, tolerance: number = getOptions().containsTolerance): boolean {
        return this.distanceTo(point) <= tolerance;
    }

    /**
     * Intersection with the infinite extension of `line`.
     * Throws DegenerateGeometryError when the line is parallel to the plane.
     */
    intersect(line: Line): Point {
        const hit = intersectionLinePlane(
            [line.pointA, line.pointB],
            [this.state.pointA, this.state.pointB, this.state.pointC]
        );
        return new Point(hit);
    }
}
