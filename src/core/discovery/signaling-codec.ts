/**
 * Signaling envelope codec
 *
 * The wire schema lives in proto/signaling.proto and is loaded once at run
 * time. Decoded messages are narrowed into the tagged unions below so the
 * rest of the client never touches raw protobuf objects.
 */

import { fileURLToPath } from 'url';
import protobuf from 'protobufjs';
import type { Type } from 'protobufjs';
import { v4 as uuidv4 } from 'uuid';
import { NetworkError } from '../../utils/errors.js';

export const ENVELOPE_VERSION = 1;

const SCHEMA_PATH = fileURLToPath(new URL('../../../proto/signaling.proto', import.meta.url));
const ENVELOPE_TYPE = 'actr.signaling.v1.SignalingEnvelope';

export interface WireActrType {
  manufacturer: string;
  name: string;
}

export interface WireActrId {
  realm: number;
  /** uint64 as a decimal string */
  serialNumber: string;
  type: WireActrType;
}

export interface WireCredential {
  keyId: number;
  claims: Uint8Array;
  signature: Uint8Array;
}

export interface WireError {
  code: number;
  message: string;
}

export interface WireTypeEntry {
  actrType: WireActrType;
  name: string;
  tags: string[];
  serviceFingerprint: string;
  description?: string;
  /** Unix seconds */
  publishedAt?: number;
}

export interface WireProtoSource {
  package: string;
  content: string;
}

export interface WireServiceSpec {
  name: string;
  fingerprint: string;
  protobufs: WireProtoSource[];
  description?: string;
}

export interface WireRegisterOk {
  actrId: WireActrId;
  credential: WireCredential;
}

export type WireResult<T> = { kind: 'success'; value: T } | { kind: 'error'; error: WireError };

export type ActrPayload =
  | { kind: 'discoveryRequest'; manufacturer?: string; limit?: number }
  | { kind: 'getServiceSpecRequest'; actrType: WireActrType; fingerprint?: string };

export type ServerPayload =
  | { kind: 'registerResponse'; result: WireResult<WireRegisterOk> }
  | { kind: 'discoveryResponse'; result: WireResult<WireTypeEntry[]> }
  | { kind: 'getServiceSpecResponse'; result: WireResult<WireServiceSpec> }
  | { kind: 'error'; error: WireError };

export type EnvelopeFlow =
  | { kind: 'peerToServer'; registerRequest: { actrType: WireActrType; realm: number } }
  | { kind: 'actrToServer'; source: WireActrId; credential: WireCredential; payload: ActrPayload }
  | { kind: 'serverToActr'; target?: WireActrId; payload: ServerPayload }
  | { kind: 'envelopeError'; error: WireError };

export interface SignalingEnvelope {
  envelopeVersion: number;
  envelopeId: string;
  replyFor?: string;
  timestamp: Date;
  flow: EnvelopeFlow;
}

let envelopeType: Type | undefined;

function getEnvelopeType(): Type {
  if (!envelopeType) {
    const root = protobuf.loadSync(SCHEMA_PATH);
    envelopeType = root.lookupType(ENVELOPE_TYPE);
  }
  return envelopeType;
}

export function createEnvelope(flow: EnvelopeFlow, replyFor?: string): SignalingEnvelope {
  return {
    envelopeVersion: ENVELOPE_VERSION,
    envelopeId: uuidv4(),
    replyFor,
    timestamp: new Date(),
    flow
  };
}

export function encodeEnvelope(envelope: SignalingEnvelope): Uint8Array {
  const type = getEnvelopeType();
  const millis = envelope.timestamp.getTime();
  const message = type.fromObject({
    envelopeVersion: envelope.envelopeVersion,
    envelopeId: envelope.envelopeId,
    replyFor: envelope.replyFor,
    timestamp: { seconds: Math.floor(millis / 1000), nanos: (millis % 1000) * 1_000_000 },
    ...flowToObject(envelope.flow)
  });
  return type.encode(message).finish();
}

export function decodeEnvelope(data: Uint8Array): SignalingEnvelope {
  const type = getEnvelopeType();
  let raw: unknown;
  try {
    raw = type.toObject(type.decode(data), { longs: String });
  } catch (error) {
    throw new NetworkError(`Failed to decode signaling envelope: ${describe(error)}`);
  }
  if (!isRecord(raw)) {
    throw new NetworkError('Failed to decode signaling envelope: not a message');
  }

  const timestamp = record(raw, 'timestamp');
  const seconds = timestamp ? int64(timestamp, 'seconds') : 0;
  const nanos = timestamp ? num(timestamp, 'nanos') : 0;

  return {
    envelopeVersion: num(raw, 'envelopeVersion'),
    envelopeId: str(raw, 'envelopeId'),
    replyFor: optStr(raw, 'replyFor'),
    timestamp: new Date(seconds * 1000 + Math.floor(nanos / 1_000_000)),
    flow: flowFromObject(raw)
  };
}

// ---------------------------------------------------------------------------
// Typed flow → protobuf object
// ---------------------------------------------------------------------------

function flowToObject(flow: EnvelopeFlow): Record<string, unknown> {
  switch (flow.kind) {
    case 'peerToServer':
      return { peerToServer: { registerRequest: flow.registerRequest } };
    case 'actrToServer': {
      const { kind, ...request } = flow.payload;
      return {
        actrToServer: {
          source: flow.source,
          credential: flow.credential,
          [kind]: request
        }
      };
    }
    case 'serverToActr':
      return { serverToActr: { target: flow.target, ...serverPayloadToObject(flow.payload) } };
    case 'envelopeError':
      return { envelopeError: flow.error };
  }
}

function serverPayloadToObject(payload: ServerPayload): Record<string, unknown> {
  switch (payload.kind) {
    case 'registerResponse':
      return { registerResponse: resultToObject(payload.result, value => value) };
    case 'discoveryResponse':
      return { discoveryResponse: resultToObject(payload.result, entries => ({ entries })) };
    case 'getServiceSpecResponse':
      return { getServiceSpecResponse: resultToObject(payload.result, spec => spec) };
    case 'error':
      return { error: payload.error };
  }
}

function resultToObject<T>(result: WireResult<T>, wrap: (value: T) => unknown): Record<string, unknown> {
  return result.kind === 'success' ? { success: wrap(result.value) } : { error: result.error };
}

// ---------------------------------------------------------------------------
// Decoded protobuf object → typed flow
// ---------------------------------------------------------------------------

type Obj = Record<string, unknown>;

function flowFromObject(raw: Obj): EnvelopeFlow {
  const peer = record(raw, 'peerToServer');
  if (peer) {
    const register = record(peer, 'registerRequest');
    if (!register) throw malformed('peer flow without a register request');
    return {
      kind: 'peerToServer',
      registerRequest: { actrType: actrTypeOf(record(register, 'actrType')), realm: num(register, 'realm') }
    };
  }

  const actr = record(raw, 'actrToServer');
  if (actr) {
    return {
      kind: 'actrToServer',
      source: actrIdOf(record(actr, 'source')),
      credential: credentialOf(record(actr, 'credential')),
      payload: actrPayloadOf(actr)
    };
  }

  const server = record(raw, 'serverToActr');
  if (server) {
    const target = record(server, 'target');
    return {
      kind: 'serverToActr',
      target: target ? actrIdOf(target) : undefined,
      payload: serverPayloadOf(server)
    };
  }

  const envelopeError = record(raw, 'envelopeError');
  if (envelopeError) {
    return { kind: 'envelopeError', error: errorOf(envelopeError) };
  }

  throw malformed('envelope carries no flow');
}

function actrPayloadOf(actr: Obj): ActrPayload {
  const discovery = record(actr, 'discoveryRequest');
  if (discovery) {
    return {
      kind: 'discoveryRequest',
      manufacturer: optStr(discovery, 'manufacturer'),
      limit: optNum(discovery, 'limit')
    };
  }
  const spec = record(actr, 'getServiceSpecRequest');
  if (spec) {
    return {
      kind: 'getServiceSpecRequest',
      actrType: actrTypeOf(record(spec, 'actrType')),
      fingerprint: optStr(spec, 'fingerprint')
    };
  }
  throw malformed('actor flow without a payload');
}

function serverPayloadOf(server: Obj): ServerPayload {
  const register = record(server, 'registerResponse');
  if (register) {
    return {
      kind: 'registerResponse',
      result: resultOf(register, ok => ({
        actrId: actrIdOf(record(ok, 'actrId')),
        credential: credentialOf(record(ok, 'credential'))
      }))
    };
  }
  const discovery = record(server, 'discoveryResponse');
  if (discovery) {
    return {
      kind: 'discoveryResponse',
      result: resultOf(discovery, ok => list(ok, 'entries').filter(isRecord).map(typeEntryOf))
    };
  }
  const spec = record(server, 'getServiceSpecResponse');
  if (spec) {
    return { kind: 'getServiceSpecResponse', result: resultOf(spec, serviceSpecOf) };
  }
  const error = record(server, 'error');
  if (error) {
    return { kind: 'error', error: errorOf(error) };
  }
  throw malformed('server flow without a payload');
}

function resultOf<T>(raw: Obj, parse: (ok: Obj) => T): WireResult<T> {
  const error = record(raw, 'error');
  if (error) {
    return { kind: 'error', error: errorOf(error) };
  }
  return { kind: 'success', value: parse(record(raw, 'success') ?? {}) };
}

function typeEntryOf(raw: Obj): WireTypeEntry {
  return {
    actrType: actrTypeOf(record(raw, 'actrType')),
    name: str(raw, 'name'),
    tags: list(raw, 'tags').filter((tag): tag is string => typeof tag === 'string'),
    serviceFingerprint: str(raw, 'serviceFingerprint'),
    description: optStr(raw, 'description'),
    publishedAt: optInt64(raw, 'publishedAt')
  };
}

function serviceSpecOf(raw: Obj): WireServiceSpec {
  return {
    name: str(raw, 'name'),
    fingerprint: str(raw, 'fingerprint'),
    protobufs: list(raw, 'protobufs')
      .filter(isRecord)
      .map(source => ({ package: str(source, 'package'), content: str(source, 'content') })),
    description: optStr(raw, 'description')
  };
}

function actrTypeOf(raw: Obj | undefined): WireActrType {
  return { manufacturer: raw ? str(raw, 'manufacturer') : '', name: raw ? str(raw, 'name') : '' };
}

function actrIdOf(raw: Obj | undefined): WireActrId {
  return {
    realm: raw ? num(raw, 'realm') : 0,
    serialNumber: (raw && str(raw, 'serialNumber')) || '0',
    type: actrTypeOf(raw ? record(raw, 'type') : undefined)
  };
}

function credentialOf(raw: Obj | undefined): WireCredential {
  return {
    keyId: raw ? num(raw, 'keyId') : 0,
    claims: raw ? bytes(raw, 'claims') : new Uint8Array(),
    signature: raw ? bytes(raw, 'signature') : new Uint8Array()
  };
}

function errorOf(raw: Obj): WireError {
  return { code: num(raw, 'code'), message: str(raw, 'message') };
}

function isRecord(value: unknown): value is Obj {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function record(raw: Obj, key: string): Obj | undefined {
  const value = raw[key];
  return isRecord(value) ? value : undefined;
}

function str(raw: Obj, key: string): string {
  const value = raw[key];
  return typeof value === 'string' ? value : '';
}

function optStr(raw: Obj, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' ? value : undefined;
}

function num(raw: Obj, key: string): number {
  const value = raw[key];
  return typeof value === 'number' ? value : 0;
}

function optNum(raw: Obj, key: string): number | undefined {
  const value = raw[key];
  return typeof value === 'number' ? value : undefined;
}

/** 64-bit fields decode as strings; these ones (times) fit a number */
function optInt64(raw: Obj, key: string): number | undefined {
  const value = raw[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function int64(raw: Obj, key: string): number {
  return optInt64(raw, key) ?? 0;
}

function bytes(raw: Obj, key: string): Uint8Array {
  const value = raw[key];
  return value instanceof Uint8Array ? value : new Uint8Array();
}

function list(raw: Obj, key: string): unknown[] {
  const value = raw[key];
  return Array.isArray(value) ? value : [];
}

function malformed(detail: string): NetworkError {
  return new NetworkError(`Malformed signaling envelope: ${detail}`);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
