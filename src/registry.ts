/**
 * NetworkRegistry
 * ===============
 * Handle-based boundary for hosts that must not hold object references (FFI bridges, scripting
 * layers, message-driven front ends).
 *
 * Networks live in an arena keyed by opaque integer handles. Every operation takes a handle and
 * reports a status code (`0` success, `-1` failure) or a value; no network state crosses the
 * boundary. Failures never throw: an {@link AnnError} raised underneath is recorded in
 * {@link NetworkRegistry.lastError} (and reported through `warn` when `config.warnings` is on).
 * Anything that is not an `AnnError` is a programming error and propagates.
 *
 * Handles are allocated from a monotonically increasing counter and never reused, so a stale
 * handle fails with `UnknownHandle` instead of silently addressing a newer network.
 *
 * @example
 * const registry = new NetworkRegistry();
 * const h = registry.create([2, 3, 1], [], [], []);
 * if (h !== null) {
 *   registry.fullyConnect(h);
 *   registry.randomizeWeights(h, -1, 1);
 * }
 */
import Network from './architecture/network';
import type { RandomSource } from './architecture/network/network.deterministic';
import type { OutputBuffer } from './architecture/network/network.activate';
import { AnnError } from './errors';
import { warn } from './utils/warn';

/** Opaque network identifier. */
export type NetworkHandle = number;

/** Boundary status code. */
export type Status = 0 | -1;

export const STATUS_OK: Status = 0;
export const STATUS_FAILURE: Status = -1;

/** Options for {@link NetworkRegistry}. */
export interface RegistryOptions {
  /** Random source handed to every network the registry creates. */
  random?: RandomSource;
}

export default class NetworkRegistry {
  /** Most recent failure; reset to null by every successful call. */
  lastError: AnnError | null = null;
  private readonly networks = new Map<NetworkHandle, Network>();
  private nextHandle: NetworkHandle = 1;
  private readonly random?: RandomSource;

  constructor(options: RegistryOptions = {}) {
    this.random = options.random;
  }

  /** Number of live handles. */
  get size(): number {
    return this.networks.size;
  }

  /**
   * Create a network from layer sizes and parallel connection arrays.
   * @returns A new handle, or null when construction fails.
   */
  create(
    layerSizes: readonly number[],
    sources: readonly number[],
    targets: readonly number[],
    weights: readonly number[]
  ): NetworkHandle | null {
    return this.register(
      () => new Network(layerSizes, { sources, targets, weights }, { random: this.random })
    );
  }

  /**
   * Create a network from a serialized file.
   * @returns A new handle, or null when the file cannot be read or parsed.
   */
  createFromFile(path: string): NetworkHandle | null {
    return this.register(() => Network.fromFile(path, { random: this.random }));
  }

  /** Release a handle. */
  destroy(handle: NetworkHandle): Status {
    return this.guard(handle, () => {
      this.networks.delete(handle);
    });
  }

  fullyConnect(handle: NetworkHandle): Status {
    return this.guard(handle, (net) => net.fullyConnectFeedforward());
  }

  randomizeWeights(handle: NetworkHandle, min: number, max: number): Status {
    return this.guard(handle, (net) => net.randomizeWeights(min, max));
  }

  setInput(handle: NetworkHandle, values: readonly number[]): Status {
    return this.guard(handle, (net) => net.setInput(values));
  }

  /** Copy the outputs into `buffer`; fails with `OutputSizeMismatch` on a length mismatch. */
  getOutput(handle: NetworkHandle, buffer: OutputBuffer): Status {
    return this.guard(handle, (net) => net.getOutputInto(buffer));
  }

  activate(handle: NetworkHandle): Status {
    return this.guard(handle, (net) => net.activate());
  }

  serialize(handle: NetworkHandle, path: string): Status {
    return this.guard(handle, (net) => net.serialize(path));
  }

  deserialize(handle: NetworkHandle, path: string): Status {
    return this.guard(handle, (net) => net.deserialize(path));
  }

  /** Write the network's diagnostic summary to standard output. */
  print(handle: NetworkHandle): Status {
    return this.guard(handle, (net) => {
      // eslint-disable-next-line no-console
      console.log(net.describe());
    });
  }

  private lookup(handle: NetworkHandle): Network {
    const net = this.networks.get(handle);
    if (!net) throw new AnnError('UnknownHandle', `no network registered under handle ${handle}`);
    return net;
  }

  private register(build: () => Network): NetworkHandle | null {
    try {
      const net = build();
      const handle = this.nextHandle++;
      this.networks.set(handle, net);
      this.lastError = null;
      return handle;
    } catch (err) {
      this.fail(err);
      return null;
    }
  }

  private guard(handle: NetworkHandle, op: (net: Network) => void): Status {
    try {
      op(this.lookup(handle));
      this.lastError = null;
      return STATUS_OK;
    } catch (err) {
      this.fail(err);
      return STATUS_FAILURE;
    }
  }

  private fail(err: unknown): void {
    if (!(err instanceof AnnError)) throw err;
    this.lastError = err;
    warn(`NetworkRegistry: ${err.code}: ${err.message}`);
  }
}
