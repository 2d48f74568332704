import { Vec3 } from '../interface';
import type { InputKind, LineMode, SpatialInput, SpatialVector } from '../interface';
import { DegenerateGeometryError } from '../utils/errors';
import { distancePointLine } from '../utils/geo3d';
import { checkType, COORDINATE_KINDS, parseMode, toVec3 } from '../utils/validate';

export const LINE_MODES: Readonly<Record<string, LineMode>> = {
    point: 'point',
    points: 'point',
    vector: 'vector',
};

const VECTOR_ONLY: readonly InputKind[] = ['vector'];

interface LineState {
    pointA: Vec3;
    pointB: Vec3;
    vector: Vec3;
}

function fromPoints(a: Vec3, b: Vec3): LineState {
    return { pointA: a, pointB: b, vector: b.clone().sub(a) };
}

function fromVector(a: Vec3, v: Vec3): LineState {
    return { pointA: a, pointB: a.clone().add(v), vector: v };
}

/**
 * Infinite line in 3D space, stored as base point, second point and direction.
 *
 * Invariant: pointB == pointA + vector after every mutation.
 * - `point` mode: (pointA, pointB), vector derived
 * - `vector` mode: (pointA, vector), pointB derived
 */
export class Line {
    readonly kind = 'line';
    private state: LineState;

    constructor(c0: SpatialInput, c1: SpatialInput, mode: string = 'point') {
        const m = parseMode(mode, LINE_MODES);
        checkType(COORDINATE_KINDS, c0, 'constraint_0');
        const a = toVec3(c0);

        if (m === 'point') {
            checkType(COORDINATE_KINDS, c1, 'constraint_1');
            this.state = fromPoints(a, toVec3(c1));
        } else {
            checkType(VECTOR_ONLY, c1, 'constraint_1');
            this.state = fromVector(a, toVec3(c1));
        }
    }

    get pointA(): Vec3 { return this.state.pointA.clone(); }
    set pointA(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'pointA');
        this.state = fromPoints(toVec3(value), this.state.pointB);
    }

    get pointB(): Vec3 { return this.state.pointB.clone(); }
    set pointB(value: SpatialInput) {
        checkType(COORDINATE_KINDS, value, 'pointB');
        this.state = fromPoints(this.state.pointA, toVec3(value));
    }

    get vector(): Vec3 { return this.state.vector.clone(); }
    set vector(value: SpatialVector) {
        checkType(VECTOR_ONLY, value, 'vector');
        this.state = fromVector(this.state.pointA, toVec3(value));
    }

    get length(): number {
        return this.state.vector.length();
    }

    /** Unit vector along the line. */
    get direction(): Vec3 {
        if (this.state.vector.lengthSq() === 0)
            throw new DegenerateGeometryError('Line has a zero-length direction vector');
        return this.state.vector.clone().normalize();
    }

    /**
     * Point on the line: pointA + scale * vector. Any real scale is accepted.
     */
    point(scale: number): Vec3 {
        return this.state.vector.clone().multiplyScalar(scale).add(this.state.pointA);
    }

    distanceTo(point: SpatialInput): number {
        return distancePointLine(point, this.state.pointA, this.state.pointB);
    }

    clone(): Line {
        const copy = new Line(this.state.pointA, this.state.pointB, 'point');
        copy.state = {
            pointA: this.state.pointA.clone(),
            pointB: this.state.pointB.clone(),
            vector: this.state.vector.clone(),
        };
        return copy;
    }
}
