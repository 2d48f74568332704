export * from './point';

export type LineMode = 'point' | 'vector';
export type PlaneMode = 'points' | 'vector' | 'normal';

/** Triangle given by its three corners, as accepted by the free functions. */
export type Triangle<T> = readonly [T, T, T];

/** Segment given by its two end points. */
export type Segment<T> = readonly [T, T];
