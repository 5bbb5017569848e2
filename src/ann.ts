import Network from './architecture/network';
import Neuron, { NeuronKind, NEURON_KIND_COUNT } from './architecture/neuron';
import Connection from './architecture/connection';
import NetworkRegistry, { STATUS_OK, STATUS_FAILURE } from './registry';
import { Activation } from './methods/activation';
import { AnnError, isAnnError } from './errors';
import { config } from './config';

export type { NetworkOptions, NetworkState } from './architecture/network';
export type { ConnectionJSON } from './architecture/connection';
export type { ConnectionArrays, LayerCounts } from './architecture/network/network.topology';
export type { RandomSource, RNGSnapshot } from './architecture/network/network.deterministic';
export type { OutputBuffer, RunOptions } from './architecture/network/network.activate';
export type { NetworkJSON } from './architecture/network/network.serialize';
export type { NetworkHandle, Status, RegistryOptions } from './registry';
export type { AnnErrorCode } from './errors';
export type { AnnConfig } from './config';

export {
  Network,
  Neuron,
  NeuronKind,
  NEURON_KIND_COUNT,
  Connection,
  NetworkRegistry,
  STATUS_OK,
  STATUS_FAILURE,
  Activation,
  AnnError,
  isAnnError,
  config,
};
