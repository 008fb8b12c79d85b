export type { JsonField, DurationField, FieldValue, MessageFields, Message, RawMessage } from './message.js';
export { jsonField, readStringField, submissionDate } from './message.js';
export { splitPath } from './path.js';
export type { RouteSpec } from './route.js';
export { TELEMETRY_DIMENSIONS, DEFAULT_ROUTES, UNKNOWN_DIMENSION, UNKNOWN_GEO } from './route.js';
export type { NormalizedChannel } from './channel.js';
export { normalizeChannel } from './channel.js';
export type { JsonObject, Scalar, PingShape, PingKind } from './ping-shape.js';
export { classifyPing, findPath, findScalar, isJsonObject } from './ping-shape.js';
export type { ExpiringCuckooFilterOptions, AddResult, FilterSnapshot } from './dedupe/expiring-cuckoo-filter.js';
export { ExpiringCuckooFilter, WINDOW_INTERVALS } from './dedupe/expiring-cuckoo-filter.js';
