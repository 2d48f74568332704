/**
 * Argument checks shared by every constructor and setter.
 * All checks run before any field is assigned, so a failed check never
 * leaves an entity half-updated.
 */

import * as THREE from 'three';
import { Vec2, Vec3 } from '../interface';
import type { InputKind, PlanarInput, SpatialInput } from '../interface';
import {
    DimensionMismatchError,
    InvalidModeError,
    RangeViolationError,
    TypeMismatchError,
} from './errors';

type CoordinateInput = SpatialInput | PlanarInput;

/** Kinds accepted wherever spatial coordinates are read. */
export const COORDINATE_KINDS: readonly InputKind[] = ['vector', 'point', 'vertex'];
const PLANAR_KINDS: readonly InputKind[] = ['vector', 'uvpoint'];
const ANY_COORDINATE_KINDS: readonly InputKind[] = [...COORDINATE_KINDS, 'uvpoint'];

export function isNumericArray(value: unknown): value is readonly number[] {
    return Array.isArray(value);
}

/**
 * Runtime discriminant of an argument. Raw numeric sequences and three.js
 * vectors are `vector`; library entities report their own `kind`.
 */
export function kindOf(value: unknown): string {
    if (isNumericArray(value))
        return value.every((c) => typeof c === 'number') ? 'vector' : 'array';
    if (value instanceof THREE.Vector3 || value instanceof THREE.Vector2)
        return 'vector';
    if (typeof value === 'object' && value !== null && 'kind' in value && typeof value.kind === 'string')
        return value.kind;
    if (value === null)
        return 'null';
    return typeof value;
}

export function dimensionOf(value: CoordinateInput): number {
    if (isNumericArray(value))          return value.length;
    if (value instanceof THREE.Vector3) return 3;
    if (value instanceof THREE.Vector2) return 2;
    return value.dimension;
}

/**
 * Every argument must reduce to a coordinate vector of exactly `expected` entries.
 */
export function checkDimension(expected: number, ...args: CoordinateInput[]): void {
    for (const arg of args) {
        checkType(ANY_COORDINATE_KINDS, arg, 'coords');
        const actual = dimensionOf(arg);
        if (actual !== expected)
            throw new DimensionMismatchError(expected, actual);
    }
}

/**
 * The argument's runtime kind must be one of `allowed`.
 * @returns the detected kind
 */
export function checkType(allowed: readonly InputKind[], value: unknown, name: string): InputKind {
    const actual = kindOf(value);
    const match = allowed.find((k) => k === actual);
    if (match === undefined)
        throw new TypeMismatchError(name, allowed, actual);
    return match;
}

export function checkRange(min: number, max: number, value: number): void {
    if (!(min <= value && value <= max))
        throw new RangeViolationError(value, min, max);
}

/**
 * Lower-case a mode string and resolve it through an alias table.
 */
export function parseMode<M extends string>(mode: unknown, aliases: Readonly<Record<string, M>>): M {
    if (typeof mode !== 'string')
        throw new TypeMismatchError('mode', ['string'], kindOf(mode));
    const key = mode.toLowerCase();
    if (!Object.hasOwn(aliases, key))
        throw new InvalidModeError(mode, Object.keys(aliases));
    return aliases[key];
}

/**
 * Coordinates of any spatial input as a fresh three.js vector.
 */
export function toVec3(input: SpatialInput): Vec3 {
    checkType(COORDINATE_KINDS, input, 'coords');
    checkDimension(3, input);
    if (isNumericArray(input))          return new Vec3(input[0], input[1], input[2]);
    if (input instanceof THREE.Vector3) return input.clone();
    return input.toVector();
}

export function toVec2(input: PlanarInput): Vec2 {
    checkType(PLANAR_KINDS, input, 'coords');
    checkDimension(2, input);
    if (isNumericArray(input))          return new Vec2(input[0], input[1]);
    if (input instanceof THREE.Vector2) return input.clone();
    return input.toVector();
}


export function isSpatialInput(value: unknown): value is SpatialInput {
    const kind = kindOf(value);
    return COORDINATE_KINDS.some((k) => k === kind);
}

/**
 * Resolve the `(coords)` / `(x, y, z)` constructor forms into one input.
 */
export function collectCoords<T>(first: T | number, rest: readonly number[]): T | number[] {
    if (typeof first === 'number')
        return [first, ...rest];
    if (rest.length > 0)
        throw new TypeMismatchError('coords', ['one coordinate vector', 'scalars'], 'mixed arguments');
    return first;
}
