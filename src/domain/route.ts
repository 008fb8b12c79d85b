/** Routing configuration for one submission namespace. */
export interface RouteSpec {
  /** Field names populated positionally from the path components after the document id. */
  readonly dimensions: readonly string[];
  readonly maxPathLength: number;
  /** Logger name stamped on records; defaults to the namespace. */
  readonly logger?: string;
}

export const TELEMETRY_DIMENSIONS = [
  'docType',
  'appName',
  'appVersion',
  'appUpdateChannel',
  'appBuildId',
] as const;

export const DEFAULT_ROUTES: Readonly<Record<string, RouteSpec>> = {
  telemetry: {
    dimensions: TELEMETRY_DIMENSIONS,
    maxPathLength: 10240,
  },
};

/** Sentinel for a dimension that could not be determined. */
export const UNKNOWN_DIMENSION = 'UNKNOWN';

/** Sentinel for a geo field with no lookup result. */
export const UNKNOWN_GEO = '??';
