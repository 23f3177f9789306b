// Main entry point
export { WorkloadStorage } from './WorkloadStorage.js';
export type { WorkloadStorageConfig } from './WorkloadStorage.js';

// Domain model
export type { GenerationRequest, StorageConf, WorkloadFormat } from './domain/model/GenerationRequest.js';
export { createGenerationRequest, UNBOUNDED_ROW_END } from './domain/model/GenerationRequest.js';
export type {
  WorkloadStorageErrorCode,
  ErrorCategory,
  ErrorDetailsByCode,
  UnsupportedOperation,
} from './domain/model/WorkloadStorageError.js';
export { WorkloadStorageError, isWorkloadStorageError } from './domain/model/WorkloadStorageError.js';

// Domain services
export { parseWorkloadConfig, formatWorkloadUri, WORKLOAD_URI_BASE } from './domain/services/ConfigParser.js';

// Use cases
export { BindGenerator } from './application/usecases/BindGenerator.js';
export type { ResolvedGenerator } from './application/usecases/BindGenerator.js';
export { EventBus } from './application/EventBus.js';

// Ports (for custom generators and storage registries)
export type { ExternalStorage, RangedRead } from './domain/ports/ExternalStorage.js';
export type {
  Datum,
  Row,
  Table,
  FlagParser,
  Generator,
  GeneratorMeta,
  FlagConfigurableGenerator,
} from './domain/ports/Generator.js';
export { isFlagConfigurable } from './domain/ports/Generator.js';
export type { GeneratorLookup } from './domain/ports/GeneratorLookup.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  StorageOpenedEvent,
  ReadStartedEvent,
  ReadCompletedEvent,
  ReadAbortedEvent,
  OperationRejectedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { CsvRowStream } from './infrastructure/streams/CsvRowStream.js';
export type { CsvRowStreamOptions } from './infrastructure/streams/CsvRowStream.js';
export { CsvRowEncoder } from './infrastructure/encoding/CsvRowEncoder.js';
export type { CsvRowEncoderOptions } from './infrastructure/encoding/CsvRowEncoder.js';
export { CommanderFlagSet } from './infrastructure/flags/CommanderFlagSet.js';
export { GeneratorRegistry, createDefaultRegistry } from './infrastructure/registry/GeneratorRegistry.js';
export { bankGenerator } from './infrastructure/generators/BankGenerator.js';
export { sequenceGenerator } from './infrastructure/generators/SequenceGenerator.js';
