import type { Sequelize } from 'sequelize';
import type {
  BatchRepository,
  CircuitStateStore,
  GradingStateStore,
  IdempotencyStore,
  LeaseStore,
  SharedStore,
  StagingStore,
} from '@predgrid/core';
import { defineLeaseModel } from './models/LeaseModel.js';
import type { LeaseModel } from './models/LeaseModel.js';
import { defineBatchModel } from './models/BatchModel.js';
import type { BatchModel } from './models/BatchModel.js';
import { defineShardModel } from './models/ShardModel.js';
import type { ShardModel } from './models/ShardModel.js';
import { defineStagingAreaModel, defineStagingRowModel } from './models/StagingModel.js';
import type { StagingAreaModel, StagingRowModel } from './models/StagingModel.js';
import { definePredictionModel } from './models/PredictionModel.js';
import type { PredictionModel } from './models/PredictionModel.js';
import { defineGradeModel } from './models/GradeModel.js';
import type { GradeModel } from './models/GradeModel.js';
import { defineCircuitModel, defineGradingStateModel, defineIdempotencyModel } from './models/OperationalModels.js';
import type { CircuitModel, GradingStateModel, IdempotencyModel } from './models/OperationalModels.js';
import { SequelizeLeaseStore } from './SequelizeLeaseStore.js';
import { SequelizeBatchRepository } from './SequelizeBatchRepository.js';
import { SequelizeStagingStore } from './SequelizeStagingStore.js';
import { SequelizeSharedStore } from './SequelizeSharedStore.js';
import { SequelizeIdempotencyStore } from './SequelizeIdempotencyStore.js';
import { SequelizeCircuitStateStore } from './SequelizeCircuitStateStore.js';
import { SequelizeGradingStateStore } from './SequelizeGradingStateStore.js';

export interface SequelizeStateStoreOptions {
  /** Prepended to every table name. Default: `predgrid_`. */
  readonly tablePrefix?: string;
}

/** The persistence ports of a pipeline, ready to spread into its port set. */
export interface PersistencePorts {
  readonly leaseStore: LeaseStore;
  readonly batches: BatchRepository;
  readonly staging: StagingStore;
  readonly sharedStore: SharedStore;
  readonly idempotency: IdempotencyStore;
  readonly circuits: CircuitStateStore;
  readonly gradingStates: GradingStateStore;
}

/**
 * Every predgrid persistence port on one relational database, through
 * Sequelize v6. Any dialect Sequelize supports works (PostgreSQL, MySQL,
 * MariaDB, SQLite, MS SQL Server).
 *
 * Call `initialize()` after construction to create the tables.
 *
 * @example
 * ```ts
 * const store = new SequelizeStateStore(sequelize, { tablePrefix: 'nightly_' });
 * await store.initialize();
 * const pipeline = new PredictionPipeline({ ports: { ...store.ports(), workQueue, ... } });
 * ```
 */
export class SequelizeStateStore {
  readonly leases: SequelizeLeaseStore;
  readonly batches: SequelizeBatchRepository;
  readonly staging: SequelizeStagingStore;
  readonly sharedStore: SequelizeSharedStore;
  readonly idempotency: SequelizeIdempotencyStore;
  readonly circuits: SequelizeCircuitStateStore;
  readonly gradingStates: SequelizeGradingStateStore;

  private readonly Lease: LeaseModel;
  private readonly Batch: BatchModel;
  private readonly Shard: ShardModel;
  private readonly StagingArea: StagingAreaModel;
  private readonly StagingRow: StagingRowModel;
  private readonly Prediction: PredictionModel;
  private readonly Grade: GradeModel;
  private readonly Idempotency: IdempotencyModel;
  private readonly Circuit: CircuitModel;
  private readonly GradingState: GradingStateModel;

  constructor(sequelize: Sequelize, options: SequelizeStateStoreOptions = {}) {
    const prefix = options.tablePrefix ?? 'predgrid_';
    this.Lease = defineLeaseModel(sequelize, prefix);
    this.Batch = defineBatchModel(sequelize, prefix);
    this.Shard = defineShardModel(sequelize, prefix);
    this.StagingArea = defineStagingAreaModel(sequelize, prefix);
    this.StagingRow = defineStagingRowModel(sequelize, prefix);
    this.Prediction = definePredictionModel(sequelize, prefix);
    this.Grade = defineGradeModel(sequelize, prefix);
    this.Idempotency = defineIdempotencyModel(sequelize, prefix);
    this.Circuit = defineCircuitModel(sequelize, prefix);
    this.GradingState = defineGradingStateModel(sequelize, prefix);

    this.leases = new SequelizeLeaseStore(this.Lease);
    this.batches = new SequelizeBatchRepository(sequelize, this.Batch, this.Shard);
    this.staging = new SequelizeStagingStore(sequelize, this.StagingArea, this.StagingRow);
    this.sharedStore = new SequelizeSharedStore(sequelize, this.Prediction, this.Grade);
    this.idempotency = new SequelizeIdempotencyStore(this.Idempotency);
    this.circuits = new SequelizeCircuitStateStore(this.Circuit);
    this.gradingStates = new SequelizeGradingStateStore(this.GradingState);
  }

  async initialize(): Promise<void> {
    await this.Lease.sync();
    await this.Batch.sync();
    await this.Shard.sync();
    await this.StagingArea.sync();
    await this.StagingRow.sync();
    await this.Prediction.sync();
    await this.Grade.sync();
    await this.Idempotency.sync();
    await this.Circuit.sync();
    await this.GradingState.sync();
  }

  ports(): PersistencePorts {
    return {
      leaseStore: this.leases,
      batches: this.batches,
      staging: this.staging,
      sharedStore: this.sharedStore,
      idempotency: this.idempotency,
      circuits: this.circuits,
      gradingStates: this.gradingStates,
    };
  }
}
