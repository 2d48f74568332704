/**
 * Vector algebra in 3D space.
 *
 * Every function takes raw coordinates (arrays, three.js vectors or point-like
 * entities) and returns fresh vectors. Degenerate configurations that would
 * divide by zero throw DegenerateGeometryError instead of producing NaN.
 */

import { Vec2, Vec3 } from '../interface';
import type { Segment, SpatialInput, SpatialVector, Triangle } from '../interface';
import { DegenerateGeometryError } from './errors';
import { toVec3 } from './validate';

/**
 * Normal of the triangle (p0, p1, p2): cross(p1 - p0, p2 - p0). Not normalized.
 */
export function calculateNormal(p0: SpatialInput, p1: SpatialInput, p2: SpatialInput): Vec3 {
    const a = toVec3(p0);
    const u = toVec3(p1).sub(a);
    const v = toVec3(p2).sub(a);
    return u.cross(v);
}

export function distancePointPoint(a: SpatialInput, b: SpatialInput): number {
    return toVec3(b).sub(toVec3(a)).length();
}

/**
 * Distance from `point` to the infinite line through l0 and l1.
 */
export function distancePointLine(point: SpatialInput, l0: SpatialInput, l1: SpatialInput): number {
    const origin = toVec3(l0);
    const dir = toVec3(l1).sub(origin);
    const len = dir.length();
    if (len === 0)
        throw new DegenerateGeometryError('Line is defined by two coincident points');

    const w = toVec3(point).sub(origin);
    return dir.cross(w).length() / len;
}

/**
 * Distance from `point` to the plane through the three given points.
 */
export function distancePointPlane(point: SpatialInput, plane: Triangle<SpatialInput>): number {
    const normal = calculateNormal(plane[0], plane[1], plane[2]);
    const len = normal.length();
    if (len === 0)
        throw new DegenerateGeometryError('Plane is defined by collinear points');

    const w = toVec3(point).sub(toVec3(plane[0]));
    return Math.abs(normal.dot(w)) / len;
}

/**
 * Intersection of the infinite line through `line` with the plane through `plane`.
 * l0 + (n·(p0 - l0) / n·dir) * dir
 */
export function intersectionLinePlane(line: Segment<SpatialInput>, plane: Triangle<SpatialInput>): Vec3 {
    const l0 = toVec3(line[0]);
    const dir = toVec3(line[1]).sub(l0);
    const normal = calculateNormal(plane[0], plane[1], plane[2]);

    const den = normal.dot(dir);
    if (den === 0)
        throw new DegenerateGeometryError('Line is parallel to plane or plane is degenerate');

    const num = normal.dot(toVec3(plane[0]).sub(l0));
    return l0.add(dir.multiplyScalar(num / den));
}

/**
 * Projection of v0 onto v1: (v1·v0 / v1·v1) * v1
 */
export function projectVector(v0: SpatialVector, v1: SpatialVector): Vec3 {
    const a = toVec3(v0);
    const b = toVec3(v1);
    const den = b.dot(b);
    if (den === 0)
        throw new DegenerateGeometryError('Cannot project onto the zero vector');
    return b.multiplyScalar(b.dot(a) / den);
}

/**
 * Map a point in space to local UV coordinates.
 * @param origin origin of the local frame
 * @param uAxis direction of the U axis
 * @param normal normal pointing out of the UV plane; V = cross(U, -normal)
 * @param point point to map
 * @param normalize scale both axes to unit length before projecting
 */
export function mapXyzToUv(
    origin: SpatialInput,
    uAxis: SpatialVector,
    normal: SpatialVector,
    point: SpatialInput,
    normalize: boolean = true
): Vec2 {
    const p = toVec3(point).sub(toVec3(origin));
    const u = toVec3(uAxis);
    const v = u.clone().cross(toVec3(normal).negate());

    if (normalize) {
        if (u.lengthSq() === 0 || v.lengthSq() === 0)
            throw new DegenerateGeometryError('UV frame has a zero-length axis');
        u.normalize();
        v.normalize();
    }
    return new Vec2(u.dot(p), v.dot(p));
}
