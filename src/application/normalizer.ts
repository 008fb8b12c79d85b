import CRC32 from 'crc-32';
import { normalizeChannel } from '../domain/channel.js';
import { jsonField } from '../domain/message.js';
import type { FieldValue, MessageFields } from '../domain/message.js';
import { classifyPing, findPath, findScalar, isJsonObject } from '../domain/ping-shape.js';
import type { PingKind, PingShape } from '../domain/ping-shape.js';
import { UNKNOWN_DIMENSION } from '../domain/route.js';
import { SchemaValidationError } from './errors.js';
import { coerceVersion } from './schema-registry.js';
import type { SchemaRegistry } from './schema-registry.js';

/** Environment sections moved out of structured pings into `environment.<name>` fields. */
const ENVIRONMENT_OBJECTS = [
  'addons',
  'build',
  'experiments',
  'partner',
  'profile',
  'settings',
  'system',
] as const;

const MAIN_PAYLOAD_OBJECTS = [
  'addonDetails',
  'addonHistograms',
  'childPayloads', // e10s only
  'chromeHangs',
  'fileIOReports',
  'histograms',
  'info',
  'keyedHistograms',
  'lateWrites',
  'log',
  'simpleMeasurements',
  'slowSQL',
  'slowSQLstartup',
  'threadHangStats',
  'UIMeasurements',
  'gc',
] as const;

/** Payload sections moved into `payload.<name>` fields, by docType. */
const PAYLOAD_OBJECTS: ReadonlyMap<string, readonly string[]> = new Map([
  ['main', MAIN_PAYLOAD_OBJECTS],
  ['saved-session', MAIN_PAYLOAD_OBJECTS],
]);

const APPUSAGE_DOC_TYPE = 'appusage';
const APPUSAGE_VERSION = 3;

export type NormalizeResult =
  | { readonly ok: true; readonly shape: PingKind }
  | { readonly ok: false; readonly error: SchemaValidationError };

/**
 * Validates a parsed ping and folds it into the record under construction.
 *
 * `fields` already holds the routing fields taken from the URI; extracted
 * values overwrite them when present. On a validation failure nothing is
 * written and the error carries a snapshot of the fields as they were.
 */
export class DocumentNormalizer {
  constructor(private readonly schemas: SchemaRegistry) {}

  normalize(document: unknown, fields: MessageFields, dimensions: readonly string[]): NormalizeResult {
    const shape = classifyPing(document);

    const error = this.validate(shape, document, fields);
    if (error) return { ok: false, error };

    extract(shape, document, fields);

    for (const dimension of dimensions) {
      if (fields[dimension] === undefined) fields[dimension] = UNKNOWN_DIMENSION;
    }
    fields['normalizedChannel'] = normalizeChannel(fields['appUpdateChannel']);

    const clientId = fields['clientId'];
    if (typeof clientId === 'string') {
      fields['sampleId'] = sampleIdFor(clientId);
    }

    return { ok: true, shape: shape.kind };
  }

  private validate(shape: PingShape, document: unknown, fields: MessageFields): SchemaValidationError | undefined {
    const routedDocType = fields['docType'];
    let docType = typeof routedDocType === 'string' ? routedDocType : undefined;
    let version: unknown;

    switch (shape.kind) {
      case 'legacy-ftu':
      case 'legacy':
        version = shape.ver;
        break;
      case 'structured':
        version = shape.version;
        break;
      case 'appusage':
        docType = APPUSAGE_DOC_TYPE;
        version = APPUSAGE_VERSION;
        break;
      case 'core':
        version = shape.v;
        break;
      case 'generic':
        version = 1;
        break;
    }

    const schema = this.schemas.lookup(docType, version);
    const result = this.schemas.validate(schema, document);
    if (result.valid) return undefined;

    return new SchemaValidationError(
      `${docType ?? 'undefined'} schema version ${coerceVersion(version)} validation error: ${result.error}`,
      { ...fields },
    );
  }
}

function extract(shape: PingShape, document: unknown, fields: MessageFields): void {
  switch (shape.kind) {
    case 'legacy-ftu':
      // FxOS FTU ping: stored as-is
      fields['submission'] = jsonField(document);
      fields['sourceVersion'] = String(shape.ver);
      return;

    case 'legacy': {
      const info = findPath(document, 'info');
      fields['submission'] = jsonField(document);
      fields['sourceVersion'] = String(shape.ver);

      fields['docType'] = findScalar(info, 'reason') ?? UNKNOWN_DIMENSION;
      fields['appName'] = findScalar(info, 'appName') ?? UNKNOWN_DIMENSION;
      fields['appVersion'] = findScalar(info, 'appVersion') ?? UNKNOWN_DIMENSION;
      fields['appUpdateChannel'] = findScalar(info, 'appUpdateChannel') ?? UNKNOWN_DIMENSION;
      fields['appBuildId'] = findScalar(info, 'appBuildID') ?? UNKNOWN_DIMENSION;

      // Old telemetry was always enabled
      fields['telemetryEnabled'] = true;

      // No defaults for these
      setField(fields, 'os', findScalar(info, 'OS'));
      setField(fields, 'appVendor', findScalar(info, 'vendor'));
      setField(fields, 'reason', findScalar(info, 'reason'));
      setField(fields, 'clientId', findScalar(document, 'clientID'));
      return;
    }

    case 'structured': {
      fields['submission'] = jsonField(document);

      const creationDate = findScalar(document, 'creationDate');
      if (typeof creationDate === 'string') {
        setField(fields, 'creationTimestamp', rfc3339ToNs(creationDate));
      }

      setField(fields, 'reason', findScalar(document, 'payload', 'info', 'reason'));
      setField(fields, 'os', findScalar(document, 'environment', 'system', 'os', 'name'));
      setField(fields, 'telemetryEnabled', findScalar(document, 'environment', 'settings', 'telemetryEnabled'));
      setField(fields, 'activeExperimentId', findScalar(document, 'environment', 'addons', 'activeExperiment', 'id'));
      setField(fields, 'clientId', findScalar(document, 'clientId'));
      fields['sourceVersion'] = String(shape.version);
      setField(fields, 'docType', findScalar(document, 'type'));

      const app = findPath(document, 'application');
      setField(fields, 'appName', findScalar(app, 'name'));
      setField(fields, 'appVersion', findScalar(app, 'version'));
      setField(fields, 'appBuildId', findScalar(app, 'buildId'));
      setField(fields, 'appUpdateChannel', findScalar(app, 'channel'));
      setField(fields, 'appVendor', findScalar(app, 'vendor'));

      moveObjects(fields, document, 'environment', ENVIRONMENT_OBJECTS);
      const docType = fields['docType'];
      if (typeof docType === 'string') {
        moveObjects(fields, document, 'payload', PAYLOAD_OBJECTS.get(docType) ?? []);
      }
      return;
    }

    case 'appusage': {
      fields['docType'] = APPUSAGE_DOC_TYPE;
      fields['submission'] = jsonField(document);
      fields['sourceVersion'] = String(APPUSAGE_VERSION);

      fields['appName'] = 'FirefoxOS';
      fields['appVersion'] = findScalar(document, 'deviceinfo', 'platform_version') ?? UNKNOWN_DIMENSION;
      fields['appUpdateChannel'] = findScalar(document, 'deviceinfo', 'update_channel') ?? UNKNOWN_DIMENSION;
      fields['appBuildId'] = findScalar(document, 'deviceinfo', 'platform_build_id') ?? UNKNOWN_DIMENSION;
      // telemetryEnabled does not apply to this ping
      return;
    }

    case 'core':
      fields['sourceVersion'] = String(shape.v);
      setField(fields, 'clientId', findScalar(document, 'clientId'));
      fields['submission'] = jsonField(document);
      return;

    case 'generic':
      fields['submission'] = jsonField(document);
      return;
  }
}

function setField(fields: MessageFields, name: string, value: FieldValue | undefined): void {
  if (value !== undefined) fields[name] = value;
}

/**
 * Moves each named child of `document[section]` into its own
 * `<section>.<name>` field, removing it from the document.
 */
function moveObjects(
  fields: MessageFields,
  document: unknown,
  section: string,
  names: readonly string[],
): void {
  const parent = findPath(document, section);
  if (!isJsonObject(parent)) return;

  for (const name of names) {
    const child = parent[name];
    if (child === undefined) continue;
    fields[`${section}.${name}`] = jsonField(child);
    delete parent[name];
  }
}

function rfc3339ToNs(value: string): bigint | undefined {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? undefined : BigInt(ms) * 1_000_000n;
}

/** Stable 0-99 bucket for reproducible subsampling. */
export function sampleIdFor(clientId: string): number {
  return (CRC32.str(clientId) >>> 0) % 100;
}
