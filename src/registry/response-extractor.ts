/**
 * Registry Response Extractor
 *
 * The registry endpoint's payload shape is not contractually fixed, so model
 * ids are recovered by a list of shape decoders tried in precedence order.
 * The first decoder that yields at least one id wins; when every decoder
 * rejects the payload the result is the `none` shape with no ids.
 *
 * Precedence:
 * 1. object-array   `[{"id": "a/b", ...}, ...]` (top-level ids containing `/`)
 * 2. loose-id-scan  any `"id": "x/y"` pair anywhere in the text
 * 3. string-array   `["a/b", "c/d"]`
 * 4. models-wrapper `{"models": <shape 1-3>}`
 * 5. single-object  `{"id": "a/b"}`
 * 6. plain-text     one identifier per line
 */

/** Model ids are namespaced `org/name`; nested ids (voices etc.) are not */
export const MODEL_ID_SEPARATOR = '/';

export type ExtractedShape =
  | { kind: 'object-array'; ids: string[] }
  | { kind: 'loose-id-scan'; ids: string[] }
  | { kind: 'string-array'; ids: string[] }
  | { kind: 'models-wrapper'; ids: string[]; inner: WrappedShape }
  | { kind: 'single-object'; ids: string[] }
  | { kind: 'plain-text'; ids: string[] }
  | { kind: 'none'; ids: [] };

export type ShapeKind = ExtractedShape['kind'];

/** Shapes a `models` wrapper may contain */
export type WrappedShape = Extract<ExtractedShape, { kind: 'object-array' | 'loose-id-scan' | 'string-array' }>;

/**
 * Payload as seen by decoders: raw text plus the JSON value when it parses.
 */
export interface RawPayload {
  text: string;
  json: unknown;
  isJson: boolean;
}

type Decoder = (payload: RawPayload) => ExtractedShape | null;

const LOOSE_ID_PATTERN = /"id"\s*:\s*"([^"]+)"/g;
const IDENTIFIER_LINE = /^[^\s{}[\]"]+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * De-duplicate while keeping first-occurrence order; blank values dropped.
 */
function distinct(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

export function parsePayload(text: string): RawPayload {
  const trimmed = text.trim();
  if (!trimmed) {
    return { text, json: undefined, isJson: false };
  }
  try {
    return { text, json: JSON.parse(trimmed), isJson: true };
  } catch {
    return { text, json: undefined, isJson: false };
  }
}

export const decodeObjectArray: Decoder = ({ json }) => {
  if (!Array.isArray(json)) {
    return null;
  }
  const ids = distinct(
    json.flatMap((item) =>
      isRecord(item) && typeof item.id === 'string' && item.id.includes(MODEL_ID_SEPARATOR) ? [item.id] : []
    )
  );
  return ids.length > 0 ? { kind: 'object-array', ids } : null;
};

export const decodeLooseIdScan: Decoder = ({ text }) => {
  const ids = distinct(
    Array.from(text.matchAll(LOOSE_ID_PATTERN), (match) => match[1] ?? '').filter((id) =>
      id.includes(MODEL_ID_SEPARATOR)
    )
  );
  return ids.length > 0 ? { kind: 'loose-id-scan', ids } : null;
};

export const decodeStringArray: Decoder = ({ json }) => {
  if (!Array.isArray(json)) {
    return null;
  }
  const ids = distinct(json.filter((item): item is string => typeof item === 'string'));
  return ids.length > 0 ? { kind: 'string-array', ids } : null;
};

const WRAPPED_DECODERS: readonly Decoder[] = [decodeObjectArray, decodeLooseIdScan, decodeStringArray];

function isWrappedShape(shape: ExtractedShape): shape is WrappedShape {
  return shape.kind === 'object-array' || shape.kind === 'loose-id-scan' || shape.kind === 'string-array';
}

export const decodeModelsWrapper: Decoder = ({ json }) => {
  if (!isRecord(json) || !('models' in json)) {
    return null;
  }
  const models = json.models;
  const inner: RawPayload = { text: JSON.stringify(models) ?? '', json: models, isJson: true };
  for (const decode of WRAPPED_DECODERS) {
    const shape = decode(inner);
    if (shape && isWrappedShape(shape)) {
      return { kind: 'models-wrapper', ids: shape.ids, inner: shape };
    }
  }
  return null;
};

export const decodeSingleObject: Decoder = ({ json }) => {
  if (!isRecord(json) || typeof json.id !== 'string' || !json.id.trim()) {
    return null;
  }
  return { kind: 'single-object', ids: [json.id.trim()] };
};

/**
 * Only applies to payloads that are not JSON. A line must be a single token
 * with no whitespace, quotes, braces or brackets to count as an identifier.
 */
export const decodePlainText: Decoder = ({ text, isJson }) => {
  if (isJson) {
    return null;
  }
  const ids = distinct(
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith('{') && !line.startsWith('['))
      .filter((line) => IDENTIFIER_LINE.test(line))
  );
  return ids.length > 0 ? { kind: 'plain-text', ids } : null;
};

/**
 * Decoders in precedence order
 */
export const SHAPE_DECODERS: ReadonlyArray<{ kind: ShapeKind; decode: Decoder }> = [
  { kind: 'object-array', decode: decodeObjectArray },
  { kind: 'loose-id-scan', decode: decodeLooseIdScan },
  { kind: 'string-array', decode: decodeStringArray },
  { kind: 'models-wrapper', decode: decodeModelsWrapper },
  { kind: 'single-object', decode: decodeSingleObject },
  { kind: 'plain-text', decode: decodePlainText },
];

/**
 * Decode a registry payload into its recognised shape.
 */
export function decodeModelIds(text: string): ExtractedShape {
  const payload = parsePayload(text);
  for (const { decode } of SHAPE_DECODERS) {
    const shape = decode(payload);
    if (shape) {
      return shape;
    }
  }
  return { kind: 'none', ids: [] };
}

/**
 * Best-effort ordered, de-duplicated model ids from a registry payload.
 * Never throws; unrecognised payloads yield an empty list.
 */
export function extractModelIds(text: string): string[] {
  return decodeModelIds(text).ids;
}
