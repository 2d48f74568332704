export interface GeometryOptions {
    /** Per-component tolerance when matching edge endpoints. */
    endpointTolerance: number;
    /** Distance under which a point counts as lying on a plane. */
    containsTolerance: number;
    /** Print `[Tag]` debug lines to the console. */
    debug: boolean;
}

/**
 * Default geometry options
 */
export const DEFAULT_GEOMETRY_OPTIONS: Readonly<GeometryOptions> = Object.freeze({
    endpointTolerance: 1e-8,
    containsTolerance: 1e-9,
    debug: process.env.SOLIDGEO_DEBUG === '1',
});

let current: GeometryOptions = { ...DEFAULT_GEOMETRY_OPTIONS };

/**
 * Merge overrides into the active options and return the result.
 */
export function configure(options: Partial<GeometryOptions> = {}): GeometryOptions {
    current = { ...current, ...options };
    return getOptions();
}

export function getOptions(): GeometryOptions {
    return { ...current };
}

export function resetOptions(): void {
    current = { ...DEFAULT_GEOMETRY_OPTIONS };
}
