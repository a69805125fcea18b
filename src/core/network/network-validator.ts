/**
 * TCP reachability and latency probing.
 *
 * A successful TCP connect is the reachability signal; nothing is sent over
 * the socket. Connectivity checks report failures as statuses and never throw.
 */

import net from 'net';
import { setTimeout as sleep } from 'timers/promises';
import type {
  ConnectivityOptions,
  ConnectivityStatus,
  HealthStatus,
  LatencyInfo,
  NetworkCheckResult
} from '../../types/index.js';
import type { NetworkValidator } from '../components/types.js';
import { parseSocketAddress } from './address.js';
import { NetworkError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_NETWORK_TIMEOUT_MS = 5000;

export interface NetworkValidatorOptions {
  timeoutMs?: number;
  /** Reachable but slower than this is reported as degraded */
  degradedThresholdMs?: number;
  latencySamples?: number;
  sampleIntervalMs?: number;
}

export class TcpNetworkValidator implements NetworkValidator {
  private readonly timeoutMs: number;
  private readonly degradedThresholdMs: number;
  private readonly latencySamples: number;
  private readonly sampleIntervalMs: number;

  constructor(options: NetworkValidatorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_NETWORK_TIMEOUT_MS;
    this.degradedThresholdMs = options.degradedThresholdMs ?? 1000;
    this.latencySamples = options.latencySamples ?? 3;
    this.sampleIntervalMs = options.sampleIntervalMs ?? 100;
  }

  async checkConnectivity(address: string, options?: ConnectivityOptions): Promise<ConnectivityStatus> {
    const target = parseSocketAddress(address);
    if (!target) {
      return { isReachable: false, error: `Invalid address '${address}': expected host:port` };
    }

    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;
    const started = performance.now();
    try {
      await probe(target.host, target.port, timeoutMs);
      const responseTimeMs = Math.round(performance.now() - started);
      logger.debug('TCP probe succeeded', { address, responseTimeMs });
      return { isReachable: true, responseTimeMs };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug('TCP probe failed', { address, error: message });
      return { isReachable: false, error: message };
    }
  }

  async verifyServiceHealth(address: string): Promise<HealthStatus> {
    return this.healthOf(await this.checkConnectivity(address));
  }

  async testLatency(address: string): Promise<LatencyInfo> {
    const samples: number[] = [];
    let lastError: string | undefined;

    for (let i = 0; i < this.latencySamples; i++) {
      if (i > 0) {
        await sleep(this.sampleIntervalMs);
      }
      const status = await this.checkConnectivity(address);
      if (status.isReachable && status.responseTimeMs !== undefined) {
        samples.push(status.responseTimeMs);
      } else {
        lastError = status.error;
      }
    }

    if (samples.length === 0) {
      throw new NetworkError(`All latency samples to ${address} failed: ${lastError ?? 'unreachable'}`);
    }

    return {
      minMs: Math.min(...samples),
      maxMs: Math.max(...samples),
      avgMs: Math.round(samples.reduce((sum, value) => sum + value, 0) / samples.length),
      samples: samples.length
    };
  }

  async batchCheck(addresses: string[]): Promise<NetworkCheckResult[]> {
    const results: NetworkCheckResult[] = [];
    for (const address of addresses) {
      const connectivity = await this.checkConnectivity(address);
      const result: NetworkCheckResult = {
        address,
        connectivity,
        health: this.healthOf(connectivity)
      };
      if (connectivity.isReachable) {
        try {
          result.latency = await this.testLatency(address);
        } catch (error) {
          logger.debug('Latency test failed after a successful probe', { address, error });
        }
      }
      results.push(result);
    }
    return results;
  }

  private healthOf(status: ConnectivityStatus): HealthStatus {
    if (!status.isReachable) return 'unhealthy';
    if (status.responseTimeMs === undefined) return 'unknown';
    return status.responseTimeMs <= this.degradedThresholdMs ? 'healthy' : 'degraded';
  }
}

function probe(host: string, port: number, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const socket = net.connect({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('connect', () => {
      clearTimeout(timer);
      socket.destroy();
      resolve();
    });
    socket.once('error', error => {
      clearTimeout(timer);
      socket.destroy();
      reject(new Error(`Connection to ${host}:${port} failed: ${error.message}`));
    });
  });
}
