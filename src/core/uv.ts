/**
 * Points and lines strictly in a 2D UV frame.
 */

import { Vec2 } from '../interface';
import type { Coords2, HasCoordinates, LineMode, PlanarInput, PlanarVector } from '../interface';
import { checkType, collectCoords, parseMode, toVec2 } from '../utils/validate';
import { LINE_MODES } from './line';

export class UVPoint implements HasCoordinates<2> {
    readonly kind = 'uvpoint';
    readonly dimension = 2;
    private _coords: Vec2;

    constructor(coords: PlanarInput);
    constructor(u: number, v: number);
    constructor(first: PlanarInput | number, ...rest: number[]) {
        this._coords = toVec2(collectCoords(first, rest));
    }

    get u(): number { return this._coords.x; }
    set u(value: number) { this._coords.x = value; }

    get v(): number { return this._coords.y; }
    set v(value: number) { this._coords.y = value; }

    get coords(): Coords2 {
        return [this._coords.x, this._coords.y];
    }
    set coords(value: PlanarInput) {
        this._coords = toVec2(value);
    }

    toVector(): Vec2 {
        return this._coords.clone();
    }

    clone(): UVPoint {
        return new UVPoint(this._coords);
    }

    equals(other: PlanarInput, tolerance: number = 0): boolean {
        const o = toVec2(other);
        return Math.abs(o.x - this._coords.x) <= tolerance
            && Math.abs(o.y - this._coords.y) <= tolerance;
    }
}

/**
 * Line in UV space, with the same point/vector consistency as Line.
 */
export class UVLine {
    readonly kind = 'uvline';
    private _pointA: Vec2;
    private _pointB: Vec2;
    private _vector: Vec2;

    constructor(c0: PlanarInput, c1: PlanarInput, mode: string = 'point') {
        const m: LineMode = parseMode(mode, LINE_MODES);
        checkType(['vector', 'uvpoint'], c0, 'constraint_0');
        const a = toVec2(c0);

        if (m === 'point') {
            checkType(['vector', 'uvpoint'], c1, 'constraint_1');
            const b = toVec2(c1);
            this._pointA = a;
            this._pointB = b;
            this._vector = b.clone().sub(a);
        } else {
            checkType(['vector'], c1, 'constraint_1');
            const v = toVec2(c1);
            this._pointA = a;
            this._vector = v;
            this._pointB = a.clone().add(v);
        }
    }

    get pointA(): Vec2 { return this._pointA.clone(); }
    set pointA(value: PlanarInput) {
        checkType(['vector', 'uvpoint'], value, 'pointA');
        this._pointA = toVec2(value);
        this._vector = this._pointB.clone().sub(this._pointA);
    }

    get pointB(): Vec2 { return this._pointB.clone(); }
    set pointB(value: PlanarInput) {
        checkType(['vector', 'uvpoint'], value, 'pointB');
        this._pointB = toVec2(value);
        this._vector = this._pointB.clone().sub(this._pointA);
    }

    get vector(): Vec2 { return this._vector.clone(); }
    set vector(value: PlanarVector) {
        checkType(['vector'], value, 'vector');
        this._vector = toVec2(value);
        this._pointB = this._pointA.clone().add(this._vector);
    }

    point(scale: number): Vec2 {
        return this._vector.clone().multiplyScalar(scale).add(this._pointA);
    }
}
