import * as THREE from 'three';

export const Vec3 = THREE.Vector3;
export type Vec3 = THREE.Vector3;

export const Vec2 = THREE.Vector2;
export type Vec2 = THREE.Vector2;

export type Dimension = 2 | 3;

export type Coords3 = [number, number, number];
export type Coords2 = [number, number];
export type Coords<D extends Dimension> = D extends 3 ? Coords3 : Coords2;

export type VectorOf<D extends Dimension> = D extends 3 ? Vec3 : Vec2;

/**
 * Anything that owns a coordinate vector of a fixed dimension.
 * Points, vertices and UV points implement this instead of sharing a base class.
 */
export interface HasCoordinates<D extends Dimension> {
    readonly kind: PointKind;
    readonly dimension: D;
    /** Copy of the coordinates as a plain tuple. */
    readonly coords: Coords<D>;
    /** Copy of the coordinates as a three.js vector. */
    toVector(): VectorOf<D>;
}

export type PointKind = 'point' | 'vertex' | 'uvpoint';
export type ElementKind = 'line' | 'uvline' | 'edge' | 'plane' | 'face';

/**
 * Discriminant used by runtime checks. Raw arrays and three.js vectors
 * classify as `vector`; library entities carry their own `kind`.
 */
export type InputKind = 'vector' | PointKind | ElementKind;

export interface Tagged {
    readonly kind: PointKind | ElementKind;
}

/** Coordinates in space: raw sequence, three.js vector, or a point-like entity. */
export type SpatialInput = readonly number[] | Vec3 | HasCoordinates<3>;

/** Coordinates in a UV frame. */
export type PlanarInput = readonly number[] | Vec2 | HasCoordinates<2>;

/** A direction given as a raw vector (never a point entity). */
export type SpatialVector = readonly number[] | Vec3;
export type PlanarVector = readonly number[] | Vec2;
