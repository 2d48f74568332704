/**
 * Error taxonomy for geometry construction and evaluation.
 * Every failure is thrown synchronously at the call that introduced it.
 */

export class GeometryError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'GeometryError';
    }
}

export class DimensionMismatchError extends GeometryError {
    constructor(
        public readonly expected: number,
        public readonly actual: number
    ) {
        super(`Expected argument of ${expected} dimensions, got ${actual}`);
        this.name = 'DimensionMismatchError';
    }
}

export class TypeMismatchError extends GeometryError {
    constructor(
        public readonly argument: string,
        public readonly expected: readonly string[],
        public readonly actual: string
    ) {
        super(`Argument '${argument}' takes ${expected.join(' or ')}, got ${actual}`);
        this.name = 'TypeMismatchError';
    }
}

export class InvalidModeError extends GeometryError {
    constructor(
        public readonly mode: string,
        public readonly allowed: readonly string[]
    ) {
        super(`Unknown mode '${mode}', expected one of: ${allowed.join(', ')}`);
        this.name = 'InvalidModeError';
    }
}

export class RangeViolationError extends GeometryError {
    constructor(
        public readonly value: number,
        public readonly min: number,
        public readonly max: number
    ) {
        super(`Value ${value} outside of range [${min}, ${max}]`);
        this.name = 'RangeViolationError';
    }
}

export class TopologyError extends GeometryError {
    constructor(message: string) {
        super(message);
        this.name = 'TopologyError';
    }
}

export class DegenerateGeometryError extends GeometryError {
    constructor(message: string) {
        super(message);
        this.name = 'DegenerateGeometryError';
    }
}
