import { logger } from '../utils/logger.js';
import { describeProxy } from '../drivers/proxy.js';
import type { ProxyEndpoint, ProxyRotatorStats } from '../types/proxy.js';

const log = logger.createContext('proxy-rotator');

export const DEFAULT_MAX_USES_PER_PROXY = 7;

/**
 * Hands out proxies in order, moving to the next endpoint after a usage quota
 * or on request.
 *
 * `next()` runs to completion without awaiting, so on the event loop it is its
 * own critical section: concurrent callers always see the index and the
 * counter updated together.
 */
export class ProxyRotator {
  private readonly endpoints: readonly ProxyEndpoint[];
  private readonly maxUsesPerProxy: number;
  private currentIndex = 0;
  private usesSinceRotation = 0;
  private rotations = 0;

  constructor(endpoints: readonly ProxyEndpoint[], options: { maxUsesPerProxy?: number } = {}) {
    this.endpoints = [...endpoints];
    this.maxUsesPerProxy = Math.max(1, options.maxUsesPerProxy ?? DEFAULT_MAX_USES_PER_PROXY);
    log.debug(`Initialized with ${this.endpoints.length} endpoint(s), ${this.maxUsesPerProxy} uses per proxy`);
  }

  get size(): number {
    return this.endpoints.length;
  }

  /**
   * Get the proxy for the next request.
   * @param forceRotate - Move to the next endpoint regardless of usage
   * @returns The endpoint, or null when no proxies are configured
   */
  next(forceRotate = false): ProxyEndpoint | null {
    if (this.endpoints.length === 0) {
      return null;
    }

    if (forceRotate || this.usesSinceRotation >= this.maxUsesPerProxy) {
      // A single endpoint stays in use past its quota; only the counter resets.
      if (this.endpoints.length > 1) {
        const previous = this.endpoints[this.currentIndex];
        this.currentIndex = (this.currentIndex + 1) % this.endpoints.length;
        this.rotations++;
        log.verbose(
          `Rotated ${describeProxy(previous)} -> ${describeProxy(this.endpoints[this.currentIndex])}` +
          (forceRotate ? ' (forced)' : ` (after ${this.usesSinceRotation} uses)`)
        );
      }
      this.usesSinceRotation = 0;
    }

    this.usesSinceRotation++;
    return this.endpoints[this.currentIndex];
  }

  /**
   * The endpoint that the next non-forced call would return, without using it.
   */
  current(): ProxyEndpoint | null {
    return this.endpoints[this.currentIndex] ?? null;
  }

  /**
   * Reset the usage counter, e.g. at the start of a new job.
   */
  reset(): void {
    this.usesSinceRotation = 0;
  }

  stats(): ProxyRotatorStats {
    return {
      endpoints: this.endpoints.length,
      currentIndex: this.currentIndex,
      usesSinceRotation: this.usesSinceRotation,
      rotations: this.rotations
    };
  }
}
