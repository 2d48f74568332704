import { Vec3 } from '../interface';
import type { Coords3, HasCoordinates, SpatialInput } from '../interface';
import { collectCoords } from '../utils/validate';
import { Point } from './point';

/**
 * Mesh vertex: a point in space used as a corner of edges and faces.
 */
export class Vertex implements HasCoordinates<3> {
    readonly kind = 'vertex';
    readonly dimension = 3;
    private readonly point: Point;

    constructor(coords: SpatialInput);
    constructor(x: number, y: number, z: number);
    constructor(first: SpatialInput | number, ...rest: number[]) {
        this.point = new Point(collectCoords(first, rest));
    }

    get x(): number { return this.point.x; }
    set x(value: number) { this.point.x = value; }

    get y(): number { return this.point.y; }
    set y(value: number) { this.point.y = value; }

    get z(): number { return this.point.z; }
    set z(value: number) { this.point.z = value; }

    get coords(): Coords3 { return this.point.coords; }
    set coords(value: SpatialInput) { this.point.coords = value; }

    toVector(): Vec3 {
        return this.point.toVector();
    }

    toPoint(): Point {
        return this.point.clone();
    }

    equals(other: SpatialInput, tolerance: number = 0): boolean {
        return this.point.equals(other, tolerance);
    }
}
