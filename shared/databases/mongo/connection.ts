import mongoose, { ConnectOptions } from 'mongoose';
import logger from '../../config/logger';

// Fail fast instead of queueing operations while disconnected.
// Must be set before any model is compiled.
mongoose.set('bufferCommands', false);

let globalConnection: typeof mongoose | null = null;
let connectionPromise: Promise<typeof mongoose> | null = null;

export interface MongoConnectionSettings {
	uri?: string;
	dbName?: string;
}

/**
 * Connect to MongoDB, reusing the live connection when there is one.
 * `uri` and `dbName` fall back to MONGO_URI and MONGO_DB_NAME.
 */
export async function connectMongo(
	options: Partial<ConnectOptions> = {},
	settings: MongoConnectionSettings = {}
): Promise<typeof mongoose> {
	if (globalConnection && mongoose.connection.readyState === 1) {
		return globalConnection;
	}

	if (connectionPromise) {
		return connectionPromise;
	}

	const uri = settings.uri ?? process.env.MONGO_URI;
	if (!uri) {
		throw new Error('MONGO_URI is required. Set MONGO_URI to your MongoDB connection string (e.g. mongodb://localhost:27017)');
	}
	const dbName = settings.dbName ?? process.env.MONGO_DB_NAME;

	const connOptions: ConnectOptions = {
		serverSelectionTimeoutMS: 10000,
		socketTimeoutMS: 20000,
		connectTimeoutMS: 10000,
		maxPoolSize: options.maxPoolSize ?? 20,
		minPoolSize: options.minPoolSize ?? 2,
		waitQueueTimeoutMS: 5000,
		maxIdleTimeMS: 30000,
		retryWrites: true,
		w: 'majority',
		monitorCommands: false,
		...options,
		// URI may already carry the database name
		...(dbName ? { dbName } : {}),
	};

	mongoose.set('debug', false);

	connectionPromise = (async () => {
		try {
			await mongoose.connect(uri, connOptions);

			if (mongoose.connection.readyState !== 1 || !mongoose.connection.db) {
				throw new Error(`MongoDB connection failed - State: ${mongoose.connection.readyState}, hasDb: ${Boolean(mongoose.connection.db)}`);
			}

			logger.info('MongoDB connection ready', {
				dbName: mongoose.connection.name,
				service: 'mongo-connection',
			});

			mongoose.connection.on('error', (err: Error) => {
				logger.error('MongoDB connection error', {
					error: err.message,
					service: 'mongo-connection',
				});
			});

			mongoose.connection.on('disconnected', () => {
				globalConnection = null;
				logger.warn('MongoDB disconnected', {
					service: 'mongo-connection',
				});
			});

			globalConnection = mongoose;
			return mongoose;
		} catch (error) {
			connectionPromise = null;
			const errorMessage = error instanceof Error ? error.message : String(error);
			if (errorMessage.includes('bad auth') || errorMessage.includes('Authentication failed')) {
				throw new Error(`MongoDB authentication failed. Verify the credentials in MONGO_URI; special characters in the password must be URL-encoded. Original error: ${errorMessage}`);
			}
			throw error;
		}
	})();

	return connectionPromise;
}

/**
 * Disconnect from MongoDB gracefully
 */
export async function disconnectMongo(): Promise<void> {
	if (mongoose.connection.readyState !== 0) {
		await mongoose.disconnect();
	}
	globalConnection = null;
	connectionPromise = null;
}
