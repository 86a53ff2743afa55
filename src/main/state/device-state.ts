import { createHash } from 'node:crypto';

import { formatISO, isValid, parseISO } from 'date-fns';

import {
  decodeDevicePayload,
  type DevicePayload,
  type StateFileType,
} from '../../shared-schemas/device-documents';
import { isPlainObject } from '../utils/json';

/** One decoded device document, frozen once built */
export interface DeviceState {
  readonly fileName: string;
  readonly name: string;
  readonly kind: StateFileType;
  readonly payload: DevicePayload;
  /** The document exactly as parsed */
  readonly raw: Readonly<Record<string, unknown>>;
  readonly localLastSaveTime: Date;
  readonly description: string;
  readonly urlName: string;
  readonly artifacts: readonly string[];
  /** sha-1 of the file text */
  readonly signature: string;
  /** `raw` plus the keys synthesized by the cache */
  readonly document: Readonly<Record<string, unknown>>;
}

/** Ordered by file name; replaced wholesale, never mutated */
export type StateCollection = readonly DeviceState[];

export type DevicePath = ReadonlyArray<string | number>;

export const EMPTY_COLLECTION: StateCollection = Object.freeze([]);

export type DecodeDeviceResult =
  | { ok: true; device: DeviceState }
  | { ok: false; message: string };

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function contentSignature(text: string): string {
  return createHash('sha1').update(text).digest('hex');
}

export function deviceNameFor(fileName: string, raw: Record<string, unknown>): string {
  const name = raw['DeviceName'];
  if (typeof name === 'string' && name.length > 0) return name;
  return fileName.endsWith('.json') ? fileName.slice(0, -'.json'.length) : fileName;
}

/** URL-safe device name: spaces, slashes, backslashes and dashes stripped, then encoded */
export function stateUrlName(name: string): string {
  return encodeURIComponent(name.replace(/[ /\\-]/g, ''));
}

export function describeDevice(payload: DevicePayload): string {
  switch (payload.kind) {
    case 'LightingControl':
      return 'Lighting Controller';
    case 'PowerController': {
      const outputType = payload.document.Output?.Type;
      if (outputType === 'teslamate') return 'Tesla Charging';
      if (outputType === 'meter') return 'Energy Meter';
      return 'Power Controller';
    }
    case 'TempProbes':
      return 'Temperature Probes';
    case 'OutputMetering':
      return 'Metered Outputs';
    default:
      return 'Unknown Device';
  }
}

/** Save timestamp of the document; `now` when absent or unparseable */
export function resolveSaveTime(payload: DevicePayload, now: Date): Date {
  const value = payload.kind === 'LightingControl' ? payload.document.LastStateSaveTime : payload.document.SaveTime;
  if (typeof value !== 'string' || value.length === 0) return now;
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : now;
}

function buildDocument(device: Omit<DeviceState, 'document'>): Record<string, unknown> {
  return {
    ...device.raw,
    LocalLastSaveTime: formatISO(device.localLastSaveTime),
    DeviceDescription: device.description,
    StateURLName: device.urlName,
    Artifacts: [...device.artifacts],
  };
}

function finish(device: Omit<DeviceState, 'document'>): DeviceState {
  return deepFreeze({ ...device, document: buildDocument(device) });
}

export interface DecodeDeviceInput {
  fileName: string;
  text: string;
  value: unknown;
  artifacts?: readonly string[];
  now?: Date;
}

/**
 * Decode one store file into a DeviceState. Non-object documents are rejected; a field of the
 * wrong type is absent from `payload` but kept in `raw` and `document`.
 */
export function decodeDeviceState(input: DecodeDeviceInput): DecodeDeviceResult {
  const { fileName, text, value } = input;
  if (!isPlainObject(value)) {
    return { ok: false, message: `${fileName}: expected a JSON object` };
  }
  const decoded = decodeDevicePayload(value);
  if (!decoded.ok) {
    return { ok: false, message: `${fileName}: ${decoded.message}` };
  }

  const name = deviceNameFor(fileName, value);
  return {
    ok: true,
    device: finish({
      fileName,
      name,
      kind: decoded.payload.kind,
      payload: decoded.payload,
      raw: value,
      localLastSaveTime: resolveSaveTime(decoded.payload, input.now ?? new Date()),
      description: describeDevice(decoded.payload),
      urlName: stateUrlName(name),
      artifacts: [...(input.artifacts ?? [])],
      signature: contentSignature(text),
    }),
  };
}

/** Return a copy of `device` annotated with a new artifact list. */
export function withArtifacts(device: DeviceState, artifacts: readonly string[]): DeviceState {
  return finish({
    fileName: device.fileName,
    name: device.name,
    kind: device.kind,
    payload: device.payload,
    raw: device.raw,
    localLastSaveTime: device.localLastSaveTime,
    description: device.description,
    urlName: device.urlName,
    artifacts: [...artifacts],
    signature: device.signature,
  });
}

/**
 * Walk `path` through a document. Returns `fallback` when a segment is missing,
 * or when the value found is null and a fallback was given.
 */
export function traverseDocument(root: unknown, path: DevicePath, fallback?: unknown): unknown {
  let current: unknown = root;
  for (const segment of path) {
    if (Array.isArray(current)) {
      const index = typeof segment === 'number' ? segment : Number(segment);
      if (!Number.isInteger(index) || index < 0 || index >= current.length) return fallback;
      current = current[index];
    } else if (isPlainObject(current)) {
      const key = String(segment);
      if (!Object.prototype.hasOwnProperty.call(current, key)) return fallback;
      current = current[key];
    } else {
      return fallback;
    }
  }
  if (current === null && fallback !== undefined) return fallback;
  return current;
}
