/**
 * Signaling-protocol discovery client
 *
 * Connection lifecycle:
 *   disconnected → (connect + register) → connected → request/response… → disconnected
 *
 * Any transport, decode or protocol failure during an exchange drops the
 * connection; the next call reconnects and registers again. Nothing is
 * retried within a call.
 *
 * Responses are matched by payload type only, so at most one request may be
 * in flight per client. The lock is held across each whole round trip,
 * connection setup included.
 */

import type {
  ActrType,
  AvailabilityStatus,
  ProtoFile,
  ServiceDetails,
  ServiceFilter,
  ServiceInfo
} from '../../types/index.js';
import type { ServiceDiscovery } from '../components/types.js';
import { formatActrType, formatActrUri, isActrUri, parseActrType, parseActrUri } from '../actr-uri.js';
import { createProtoFile } from '../proto/proto-files.js';
import { endpointAddressOf } from '../network/address.js';
import { matchesFilter, selectVersion } from './service-filter.js';
import {
  createEnvelope,
  type ActrPayload,
  type ServerPayload,
  type WireActrId,
  type WireCredential,
  type WireError,
  type WireResult,
  type WireServiceSpec,
  type WireTypeEntry
} from './signaling-codec.js';
import { connectWebSocket, type ConnectFn, type SignalingConnection } from './signaling-transport.js';
import { SerialLock } from '../../utils/serial-lock.js';
import { DependencyError, NetworkError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ServiceDiscoveryOptions {
  signalingUrl: string;
  /** Actor type this client registers as */
  actrType: ActrType;
  realm: number;
  /** Bound on each signaling read */
  requestTimeoutMs: number;
  connect?: ConnectFn;
}

type SignalingState =
  | { status: 'disconnected' }
  | {
      status: 'connected';
      connection: SignalingConnection;
      actrId: WireActrId;
      credential: WireCredential;
    };

type ConnectedState = Extract<SignalingState, { status: 'connected' }>;

interface ServiceTarget {
  manufacturer?: string;
  typeName: string;
}

export class NetworkServiceDiscovery implements ServiceDiscovery {
  private state: SignalingState = { status: 'disconnected' };
  private readonly lock = new SerialLock();
  private readonly connect: ConnectFn;

  constructor(private readonly options: ServiceDiscoveryOptions) {
    this.connect = options.connect ?? connectWebSocket;
  }

  get endpointAddress(): string {
    return endpointAddressOf(this.options.signalingUrl);
  }

  get isConnected(): boolean {
    return this.state.status === 'connected';
  }

  async discoverServices(filter?: ServiceFilter): Promise<ServiceInfo[]> {
    const entries = await this.discoverEntries(filter);
    return entries
      .filter(entry =>
        matchesFilter(
          { name: entryName(entry), manufacturer: entry.actrType.manufacturer, tags: entry.tags },
          filter
        )
      )
      .map(toServiceInfo);
  }

  async getServiceDetails(name: string): Promise<ServiceDetails> {
    const target = parseTarget(name);
    const entries = await this.discoverEntries();
    const entry = entries.find(candidate => matchesTarget(candidate, target));
    if (!entry) {
      throw new DependencyError(`Service not found: ${name}`);
    }

    const info = toServiceInfo(entry);
    let protoFiles: ProtoFile[] = [];
    try {
      const spec = await this.fetchServiceSpec(entry.actrType, entry.serviceFingerprint || undefined);
      protoFiles = toProtoFiles(spec);
      if (!info.fingerprint && spec.fingerprint) {
        info.fingerprint = spec.fingerprint;
      }
      info.methods = protoFiles.flatMap(file => file.services.flatMap(service => service.methods));
    } catch (error) {
      logger.warn('Failed to fetch service spec; continuing without proto files', { service: name, error });
    }

    return { info, protoFiles, dependencies: [] };
  }

  async checkServiceAvailability(name: string): Promise<AvailabilityStatus> {
    const target = parseTarget(name);
    const entries = await this.discoverEntries();
    const isAvailable = entries.some(entry => matchesTarget(entry, target));
    return {
      isAvailable,
      lastSeen: isAvailable ? new Date() : undefined,
      health: isAvailable ? 'healthy' : 'unknown'
    };
  }

  async getServiceProto(name: string): Promise<ProtoFile[]> {
    const target = parseTarget(name);
    const spec = await this.fetchServiceSpec({
      manufacturer: target.manufacturer ?? '',
      name: target.typeName
    });
    return toProtoFiles(spec);
  }

  close(): void {
    this.disconnect();
  }

  // ---------------------------------------------------------------------------
  // Requests
  // ---------------------------------------------------------------------------

  private async discoverEntries(filter?: ServiceFilter): Promise<WireTypeEntry[]> {
    const result = await this.exchange(
      'Discovery',
      { kind: 'discoveryRequest', manufacturer: filter?.manufacturer, limit: filter?.limit },
      payload => (payload.kind === 'discoveryResponse' ? payload.result : undefined)
    );
    return unwrap('Discovery failed', result);
  }

  private async fetchServiceSpec(actrType: ActrType, fingerprint?: string): Promise<WireServiceSpec> {
    const result = await this.exchange(
      'GetServiceSpec',
      { kind: 'getServiceSpecRequest', actrType, fingerprint },
      payload => (payload.kind === 'getServiceSpecResponse' ? payload.result : undefined)
    );
    return unwrap('GetServiceSpec failed', result);
  }

  /**
   * One request/response round trip under the lock. Unrelated server
   * payloads are skipped until `pick` accepts one. An error the server
   * answers with leaves the session up; a failed send or receive drops it.
   */
  private exchange<T>(
    label: string,
    payload: ActrPayload,
    pick: (payload: ServerPayload) => T | undefined
  ): Promise<T> {
    return this.lock.run(async () => {
      const session = await this.ensureConnected();
      let answered = false;
      try {
        await session.connection.send(
          createEnvelope({
            kind: 'actrToServer',
            source: session.actrId,
            credential: session.credential,
            payload
          })
        );
        logger.debug('Signaling request sent', { request: label });

        for (;;) {
          const envelope = await session.connection.receive(this.options.requestTimeoutMs);
          const flow = envelope.flow;
          if (flow.kind === 'envelopeError') {
            answered = true;
            throw signalingError(`${label} failed`, flow.error);
          }
          if (flow.kind !== 'serverToActr') continue;
          if (flow.payload.kind === 'error') {
            answered = true;
            throw signalingError(`${label} failed`, flow.payload.error);
          }
          const picked = pick(flow.payload);
          if (picked !== undefined) return picked;
        }
      } catch (error) {
        if (!answered) this.disconnect();
        throw error;
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Connection state
  // ---------------------------------------------------------------------------

  /** Callers must hold the lock */
  private async ensureConnected(): Promise<ConnectedState> {
    if (this.state.status === 'connected') {
      if (this.state.connection.isOpen) return this.state;
      this.disconnect();
    }

    const { signalingUrl, actrType, realm, requestTimeoutMs } = this.options;
    logger.debug('Connecting to signaling server', { url: signalingUrl });
    const connection = await this.connect(signalingUrl, { timeoutMs: requestTimeoutMs });

    try {
      await connection.send(
        createEnvelope({ kind: 'peerToServer', registerRequest: { actrType, realm } })
      );

      for (;;) {
        const envelope = await connection.receive(requestTimeoutMs);
        const flow = envelope.flow;
        if (flow.kind === 'envelopeError') {
          throw signalingError('Register failed', flow.error);
        }
        if (flow.kind !== 'serverToActr') continue;
        if (flow.payload.kind === 'error') {
          throw signalingError('Register failed', flow.payload.error);
        }
        if (flow.payload.kind !== 'registerResponse') continue;

        const registered = unwrap('Register failed', flow.payload.result);
        const connected: ConnectedState = {
          status: 'connected',
          connection,
          actrId: registered.actrId,
          credential: registered.credential
        };
        this.state = connected;
        logger.debug('Registered with signaling server', {
          serialNumber: registered.actrId.serialNumber,
          realm: registered.actrId.realm
        });
        return connected;
      }
    } catch (error) {
      connection.close();
      throw error;
    }
  }

  private disconnect(): void {
    if (this.state.status === 'connected') {
      this.state.connection.close();
    }
    this.state = { status: 'disconnected' };
  }
}

function signalingError(context: string, error: WireError): NetworkError {
  return new NetworkError(`${context}: ${error.message} (${error.code})`);
}

function unwrap<T>(context: string, result: WireResult<T>): T {
  if (result.kind === 'error') {
    throw signalingError(context, result.error);
  }
  return result.value;
}

function parseTarget(nameOrUri: string): ServiceTarget {
  if (isActrUri(nameOrUri)) {
    const parsed = parseActrUri(nameOrUri);
    return { manufacturer: parsed.manufacturer, typeName: parsed.typeName };
  }
  const actrType = parseActrType(nameOrUri);
  return { manufacturer: actrType.manufacturer || undefined, typeName: actrType.name };
}

function matchesTarget(entry: WireTypeEntry, target: ServiceTarget): boolean {
  if (target.manufacturer !== undefined && entry.actrType.manufacturer !== target.manufacturer) {
    return false;
  }
  return entry.actrType.name === target.typeName || entry.name === target.typeName;
}

function entryName(entry: WireTypeEntry): string {
  return entry.name || entry.actrType.name;
}

function toServiceInfo(entry: WireTypeEntry): ServiceInfo {
  const version = selectVersion(entry.tags);
  return {
    name: entryName(entry),
    version,
    description: entry.description,
    uri: formatActrUri({ name: formatActrType(entry.actrType) }),
    fingerprint: entry.serviceFingerprint,
    methods: [],
    actrType: { ...entry.actrType },
    tags: [...entry.tags],
    publishedAt: entry.publishedAt
  };
}

function toProtoFiles(spec: WireServiceSpec): ProtoFile[] {
  return spec.protobufs.map(source => createProtoFile(source.package, source.content));
}
