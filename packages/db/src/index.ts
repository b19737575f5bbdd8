import {
  connect,
  disconnect,
  Schema,
  type Connection,
  type FilterQuery,
  type HydratedDocument,
  type Model,
} from 'mongoose';

import { getConfig } from '@storefront/config';
import { logger } from '@storefront/logger';
import { traceDbOperation } from '@storefront/observability';

const config = getConfig();

let connection: Connection | null = null;

export async function connectDB(): Promise<Connection> {
  if (connection && connection.readyState === 1) {
    return connection;
  }

  try {
    const conn = await connect(config.MONGODB_URI, {
      maxPoolSize: 10,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      bufferCommands: false,
    });

    connection = conn.connection;

    connection.on('error', (error: unknown) => {
      logger.error({ error }, 'MongoDB connection error');
    });

    connection.on('disconnected', () => {
      logger.warn('MongoDB disconnected');
    });

    connection.on('reconnected', () => {
      logger.info('MongoDB reconnected');
    });

    logger.info(`Connected to MongoDB: ${connection.name}`);
    return connection;
  } catch (error) {
    logger.error({ error }, 'Failed to connect to MongoDB');
    throw error;
  }
}

export async function disconnectDB(): Promise<void> {
  if (connection) {
    await disconnect();
    connection = null;
    logger.info('Disconnected from MongoDB');
  }
}

export interface BaseFields {
  createdAt: Date;
  updatedAt: Date;
}

// Base schema plugin
export function addBaseFields(schema: Schema): void {
  schema.add({
    createdAt: {
      type: Date,
      default: Date.now,
      immutable: true,
    },
    updatedAt: {
      type: Date,
      default: Date.now,
    },
  });

  schema.pre(['updateOne', 'findOneAndUpdate'], function () {
    this.set({ updatedAt: new Date() });
  });

  // Clean JSON output
  schema.set('toJSON', {
    virtuals: false,
    transform: (_doc: unknown, ret: Record<string, unknown>) => {
      delete ret._id;
      delete ret.__v;
      return ret;
    },
  });
}

/** MongoDB duplicate key violation (unique index). */
export function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

// Base repository class
export abstract class BaseRepository<TSchema> {
  protected constructor(
    protected readonly model: Model<TSchema>,
    protected readonly collection: string
  ) {}

  protected trace<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return traceDbOperation(operation, this.collection, fn);
  }

  protected async findOneDocument(
    filter: FilterQuery<TSchema>
  ): Promise<HydratedDocument<TSchema> | null> {
    return this.model.findOne(filter).exec();
  }

  async count(filter: FilterQuery<TSchema> = {}): Promise<number> {
    return this.trace('count', async () => this.model.countDocuments(filter).exec());
  }
}
