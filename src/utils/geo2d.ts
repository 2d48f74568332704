import type { PlanarInput, Triangle } from '../interface';
import { Vec2 } from '../interface';
import { toVec2 } from './validate';

/** z component of the cross product of two planar vectors. */
export function cross2(a: Vec2, b: Vec2): number {
    return a.x * b.y - a.y * b.x;
}

/**
 * True when `p` and `q` lie on the same side of the line through a and b.
 * Points on the line count as being on either side.
 */
function sameSide(p: Vec2, q: Vec2, a: Vec2, b: Vec2): boolean {
    const edge = new Vec2().subVectors(b, a);
    const cp = cross2(edge, new Vec2().subVectors(p, a));
    const cq = cross2(edge, new Vec2().subVectors(q, a));
    return cp * cq >= 0;
}

/**
 * Whether `point` lies within the triangle `face` in UV space.
 * The boundary is inclusive.
 */
export function pointInTriangle(face: Triangle<PlanarInput>, point: PlanarInput): boolean {
    const [a, b, c] = face.map(toVec2);
    const p = toVec2(point);

    return sameSide(p, a, b, c)
        && sameSide(p, b, c, a)
        && sameSide(p, c, a, b);
}
