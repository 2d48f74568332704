import { Vec3 } from '../interface';
import type { Coords3, HasCoordinates, SpatialInput } from '../interface';
import { collectCoords, toVec3 } from '../utils/validate';

/**
 * Point in 3D space.
 * The coordinate vector is the only stored state; `x`, `y`, `z` read and
 * write through it.
 */
export class Point implements HasCoordinates<3> {
    readonly kind = 'point';
    readonly dimension = 3;
    private _coords: Vec3;

    constructor(coords: SpatialInput);
    constructor(x: number, y: number, z: number);
    constructor(first: SpatialInput | number, ...rest: number[]) {
        this._coords = toVec3(collectCoords(first, rest));
    }

    get x(): number { return this._coords.x; }
    set x(value: number) { this._coords.x = value; }

    get y(): number { return this._coords.y; }
    set y(value: number) { this._coords.y = value; }

    get z(): number { return this._coords.z; }
    set z(value: number) { this._coords.z = value; }

    get coords(): Coords3 {
        return [this._coords.x, this._coords.y, this._coords.z];
    }
    set coords(value: SpatialInput) {
        this._coords = toVec3(value);
    }

    toVector(): Vec3 {
        return this._coords.clone();
    }

    clone(): Point {
        return new Point(this._coords);
    }

    /**
     * Component-wise comparison within `tolerance`.
     */
    equals(other: SpatialInput, tolerance: number = 0): boolean {
        const o = toVec3(other);
        return Math.abs(o.x - this._coords.x) <= tolerance
            && Math.abs(o.y - this._coords.y) <= tolerance
            && Math.abs(o.z - this._coords.z) <= tolerance;
    }
}
