/**
 * Public entry. Modules under src/ import each other by relative path so the
 * emitted dist/ resolves without the `@/` alias, which only the tests use.
 */

export * from './interface';
export * from './config';
export * from './utils/errors';
export {
    calculateNormal,
    distancePointPoint,
    distancePointLine,
    distancePointPlane,
    intersectionLinePlane,
    projectVector,
    mapXyzToUv,
} from './utils/geo3d';
export { cross2, pointInTriangle } from './utils/geo2d';
export { checkDimension, checkType, checkRange, parseMode, toVec3, toVec2, kindOf } from './utils/validate';
export { createLogger } from './utils/log';
export type { Logger } from './utils/log';

export { Point } from './core/point';
export { Line, LINE_MODES } from './core/line';
export { Plane, PLANE_MODES } from './core/plane';
export { UVPoint, UVLine } from './core/uv';
export { Vertex } from './core/vertex';
export { Edge } from './core/edge';
export { Face, canonicalWinding, cornersFromEdges, referenceAxis } from './core/face';
export type { FaceOptions } from './core/face';
