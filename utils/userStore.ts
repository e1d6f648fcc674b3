import { Collection, MongoClient, MongoServerError } from "mongodb";
import { HistoryEntry } from "../schemas/itinerarySchema";
import { Configuration } from "./configuration";
import { DuplicateUserError, StoreFailure, UnknownUserError } from "./errors";

export interface UserRecord {
  _id: string;
  password: string;
  travel_history: HistoryEntry[];
}

/**
 * Keyed user documents: a password digest plus the user's itinerary history,
 * most recent first.
 */
export interface CredentialStore {
  find(username: string): Promise<UserRecord | null>;
  /** Throws DuplicateUserError if the username is taken. */
  insert(username: string, passwordDigest: string): Promise<void>;
  /** Atomically puts the entry at the front of the user's history. */
  prependHistory(username: string, entry: HistoryEntry): Promise<void>;
}

const DUPLICATE_KEY_CODE = 11000;

export class MongoCredentialStore implements CredentialStore {
  constructor(private readonly users: Collection<UserRecord>) {}

  async find(username: string): Promise<UserRecord | null> {
    try {
      return await this.users.findOne({ _id: username });
    } catch (error) {
      throw new StoreFailure("Failed to read user record", { cause: error });
    }
  }

  async insert(username: string, passwordDigest: string): Promise<void> {
    try {
      await this.users.insertOne({
        _id: username,
        password: passwordDigest,
        travel_history: [],
      });
    } catch (error) {
      if (error instanceof MongoServerError && error.code === DUPLICATE_KEY_CODE) {
        throw new DuplicateUserError(username);
      }
      throw new StoreFailure("Failed to create user record", { cause: error });
    }
  }

  async prependHistory(username: string, entry: HistoryEntry): Promise<void> {
    let matched: number;
    try {
      const result = await this.users.updateOne(
        { _id: username },
        { $push: { travel_history: { $each: [entry], $position: 0 } } }
      );
      matched = result.matchedCount;
    } catch (error) {
      throw new StoreFailure("Failed to update travel history", { cause: error });
    }
    if (matched === 0) {
      throw new UnknownUserError(username);
    }
  }
}

/**
 * Process-local store used when no MongoDB URI is configured. Records are
 * copied on the way in and out so callers never share state with the store.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly users = new Map<string, UserRecord>();

  async find(username: string): Promise<UserRecord | null> {
    const record = this.users.get(username);
    return record ? structuredClone(record) : null;
  }

  async insert(username: string, passwordDigest: string): Promise<void> {
    if (this.users.has(username)) {
      throw new DuplicateUserError(username);
    }
    this.users.set(username, {
      _id: username,
      password: passwordDigest,
      travel_history: [],
    });
  }

  async prependHistory(username: string, entry: HistoryEntry): Promise<void> {
    const record = this.users.get(username);
    if (!record) {
      throw new UnknownUserError(username);
    }
    record.travel_history.unshift(structuredClone(entry));
  }
}

export interface StoreConnection {
  store: CredentialStore;
  close(): Promise<void>;
}

export async function connectCredentialStore(
  configuration: Configuration
): Promise<StoreConnection> {
  if (!configuration.mongoUri) {
    console.log("[STORE] MONGODB_ATLAS_URI not set, keeping users in memory");
    return { store: new MemoryCredentialStore(), close: async () => {} };
  }

  const client = new MongoClient(configuration.mongoUri);
  await client.connect();
  await client.db("admin").command({ ping: 1 });
  console.log("[STORE] Pinged your deployment. You successfully connected to MongoDB!");

  const users = client
    .db(configuration.dbName)
    .collection<UserRecord>(configuration.collectionName);
  return {
    store: new MongoCredentialStore(users),
    close: () => client.close(),
  };
}
