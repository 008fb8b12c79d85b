import { gunzipSync } from 'node:zlib';
import type { Logger } from 'pino';
import { readStringField, submissionDate } from '../domain/message.js';
import type { Message, MessageFields, RawMessage } from '../domain/message.js';
import { splitPath } from '../domain/path.js';
import { DEFAULT_ROUTES, UNKNOWN_GEO } from '../domain/route.js';
import type { RouteSpec } from '../domain/route.js';
import type { DedupeFilter } from './dedupe-filter.js';
import { DecodeError, EmitError, JsonParseError, UriError, errorMessage } from './errors.js';
import type { DecodeErrorTag } from './errors.js';
import type { GeoEnricher } from './geo-enricher.js';
import { parseJson } from './json-document.js';
import { DocumentNormalizer } from './normalizer.js';
import type { SchemaRegistry } from './schema-registry.js';

/** Accepts decoded, duplicate, raw-copy and error records. */
export interface MessageSink {
  emit(message: Message): Promise<void>;
}

export interface DecoderOptions {
  /** Field holding the submitted payload bytes. */
  contentField: string;
  /** Field holding the submission URI. */
  uriField: string;
  /** Emit an untouched copy of every raw message ahead of the decoded one. */
  injectRaw: boolean;
  routes?: Readonly<Record<string, RouteSpec>>;
}

export interface DecoderDeps {
  schemas: SchemaRegistry;
  sink: MessageSink;
  log: Logger;
  geo?: GeoEnricher | undefined;
  dedupe?: DedupeFilter | undefined;
}

export type DecodeOutcome =
  | { readonly status: 'accepted'; readonly documentId: string }
  | { readonly status: 'duplicate'; readonly documentId: string; readonly age: number }
  | { readonly status: 'error'; readonly tag: DecodeErrorTag; readonly message: string };

export const RECORD_TYPE = 'telemetry';
export const DUPLICATE_TYPE = 'telemetry.duplicate';
export const ERROR_TYPE = 'telemetry.error';
const ERROR_LOGGER = 'telemetry';
const SOURCE_NAME = 'telemetry';

const GZIP_MAGIC_0 = 0x1f;
const GZIP_MAGIC_1 = 0x8b;

/** Header fields copied verbatim from the raw message when present. */
const PASSTHROUGH_FIELDS = ['Host', 'DNT', 'Date', 'X-PingSender-Version'] as const;

/** Client address fields that never leave the decoder on error records. */
const STRIPPED_ERROR_FIELDS = new Set(['X-Forwarded-For', 'RemoteAddr']);

interface Routed {
  readonly route: RouteSpec;
  readonly namespace: string;
  readonly documentId: string;
  readonly fields: MessageFields;
}

/**
 * Decodes one raw submission into a canonical record.
 *
 * URI routing, geo enrichment, JSON parsing, validation and normalization
 * and the duplicate check run in that order. Any stage may stop the
 * message with a DecodeError, which turns into a diagnostic record on
 * the same sink. Nothing is retried.
 */
export class TelemetryDecoder {
  private readonly normalizer: DocumentNormalizer;
  private readonly routes: Readonly<Record<string, RouteSpec>>;

  constructor(
    private readonly options: DecoderOptions,
    private readonly deps: DecoderDeps,
  ) {
    this.normalizer = new DocumentNormalizer(deps.schemas);
    this.routes = options.routes ?? DEFAULT_ROUTES;
  }

  async transform(raw: RawMessage): Promise<DecodeOutcome> {
    if (this.options.injectRaw) {
      await this.emitBestEffort(raw, 'Raw message copy not emitted');
    }

    try {
      return await this.decode(raw);
    } catch (err: unknown) {
      if (!(err instanceof DecodeError)) throw err;
      await this.emitError(raw, err);
      return { status: 'error', tag: err.tag, message: err.message };
    }
  }

  private async decode(raw: RawMessage): Promise<DecodeOutcome> {
    const { route, namespace, documentId, fields } = await this.route(raw);

    for (const name of PASSTHROUGH_FIELDS) {
      const value = raw.fields[name];
      if (value !== undefined) fields[name] = value;
    }
    fields['submissionDate'] = submissionDate(raw.timestamp);
    fields['sourceName'] = SOURCE_NAME;

    const document = this.parse(raw, fields);

    const normalized = this.normalizer.normalize(document, fields, route.dimensions);
    if (!normalized.ok) throw normalized.error;

    let type = RECORD_TYPE;
    let age: number | undefined;
    if (this.deps.dedupe) {
      const seen = this.deps.dedupe.testAndInsert(documentId, raw.timestamp);
      if (!seen.isNew) {
        type = DUPLICATE_TYPE;
        age = seen.age;
        fields['duplicateDelta'] = this.deps.dedupe.duplicateDelta(seen.age);
      }
    }

    const record: Message = {
      timestamp: raw.timestamp,
      logger: route.logger ?? namespace,
      type,
      hostname: raw.hostname,
      envVersion: raw.envVersion,
      fields,
    };

    try {
      await this.deps.sink.emit(record);
    } catch (err: unknown) {
      // Extra fields are left off; they would likely fail the same way.
      throw new EmitError(errorMessage(err));
    }

    return age === undefined
      ? { status: 'accepted', documentId }
      : { status: 'duplicate', documentId, age };
  }

  /** Path must look like /submit/<namespace>/<documentId>[/<dimension>...]. */
  private async route(raw: RawMessage): Promise<Routed> {
    const path = readStringField(raw, this.options.uriField) ?? '';
    const components = splitPath(path);
    if (components.length < 3) {
      throw new UriError('Not enough path components');
    }

    const [prefix = '', namespace = '', documentId = '', ...dimensionValues] = components;
    if (prefix !== 'submit') {
      throw new UriError(`Invalid path prefix: '${prefix}' in ${path}`);
    }

    const route = Object.hasOwn(this.routes, namespace) ? this.routes[namespace] : undefined;
    if (!route) {
      throw new UriError(`Invalid namespace: '${namespace}' in ${path}`);
    }

    const pathLength = Buffer.byteLength(path, 'utf8');
    if (pathLength > route.maxPathLength) {
      throw new UriError(`Path too long: ${pathLength} > ${route.maxPathLength}`);
    }

    const fields: MessageFields = { documentId };
    await this.addGeo(raw, fields);

    if (dimensionValues.length > route.dimensions.length) {
      throw new UriError('dimension/path component mismatch', { ...fields });
    }
    dimensionValues.forEach((value, i) => {
      const name = route.dimensions[i];
      if (name !== undefined) fields[name] = value;
    });

    return { route, namespace, documentId, fields };
  }

  private async addGeo(raw: RawMessage, fields: MessageFields): Promise<void> {
    const country = readStringField(raw, 'geoCountry');
    const city = readStringField(raw, 'geoCity');

    if (country === undefined && this.deps.geo) {
      const geo = this.deps.geo;
      await geo.refresh();
      const xff = readStringField(raw, 'X-Forwarded-For');
      const remoteAddr = readStringField(raw, 'RemoteAddr');
      fields['geoCountry'] = geo.country(xff, remoteAddr);
      fields['geoCity'] = geo.city(xff, remoteAddr);
      return;
    }

    fields['geoCountry'] = country ?? UNKNOWN_GEO;
    fields['geoCity'] = city ?? UNKNOWN_GEO;
  }

  private parse(raw: RawMessage, fields: MessageFields): unknown {
    const content = raw.fields[this.options.contentField];
    let bytes: Buffer;
    if (content instanceof Uint8Array) {
      bytes = Buffer.from(content.buffer, content.byteOffset, content.byteLength);
    } else if (typeof content === 'string') {
      bytes = Buffer.from(content, 'utf8');
    } else {
      throw new JsonParseError('invalid submission: no content', { ...fields });
    }

    try {
      if (bytes[0] === GZIP_MAGIC_0 && bytes[1] === GZIP_MAGIC_1) {
        bytes = gunzipSync(bytes);
      }
      return parseJson(bytes.toString('utf8'));
    } catch (err: unknown) {
      throw new JsonParseError(`invalid submission: ${errorMessage(err)}`, { ...fields });
    }
  }

  /**
   * Re-emits the raw message annotated with the failure. Client address
   * fields are dropped. A failure here is logged and dropped so an error
   * can never produce another error.
   */
  private async emitError(raw: RawMessage, err: DecodeError): Promise<void> {
    const fields: MessageFields = {};
    for (const [name, value] of Object.entries(raw.fields)) {
      if (!STRIPPED_ERROR_FIELDS.has(name)) fields[name] = value;
    }

    const extra = err.extraFields ?? {};
    if (extra['submissionDate'] === undefined) {
      fields['submissionDate'] = submissionDate(raw.timestamp);
    }
    fields['DecodeErrorType'] = err.tag;
    fields['DecodeError'] = err.message;
    Object.assign(fields, extra);

    this.deps.log.debug({ tag: err.tag, error: err.message }, 'Submission rejected');

    await this.emitBestEffort({
      timestamp: raw.timestamp,
      logger: ERROR_LOGGER,
      type: ERROR_TYPE,
      hostname: raw.hostname,
      envVersion: raw.envVersion,
      fields,
    }, 'Error record not emitted');
  }

  private async emitBestEffort(message: Message, failure: string): Promise<void> {
    try {
      await this.deps.sink.emit(message);
    } catch (err: unknown) {
      this.deps.log.warn({ err, type: message.type }, failure);
    }
  }
}
