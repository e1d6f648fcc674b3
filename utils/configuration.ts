/**
 * Define the configurable parameters for the service.
 */
import { z } from "zod";
import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { initChatModel } from "langchain/chat_models/universal";

/** Upper bound on generated tokens for every completion request. */
export const MAX_GENERATED_TOKENS = 2048;

/** Sampling temperature for every completion request. */
export const GENERATION_TEMPERATURE = 0.7;

const emptyAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const environmentSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3002),
  /**
   * MongoDB connection string. Users are kept in memory when it is not set.
   */
  MONGODB_ATLAS_URI: z.preprocess(emptyAsUndefined, z.string().optional()),
  DB_NAME: z.string().min(1).default("Travelstar"),
  COLLECTION_NAME: z.string().min(1).default("users"),
  JWT_SECRET: z.string().min(1).default("default_jwt_secret"),
  /** Token lifetime in seconds. */
  JWT_EXPIRES_IN: z.coerce.number().int().positive().default(12 * 60 * 60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  /**
   * The language model used for generation. Should be in the form: provider/model-name.
   */
  GENERATION_MODEL: z.string().min(1).default("groq/llama-3.3-70b-versatile"),
});

export interface Configuration {
  port: number;
  mongoUri?: string;
  dbName: string;
  collectionName: string;
  jwtSecret: string;
  jwtExpiresIn: number;
  bcryptRounds: number;
  generationModel: string;
}

/**
 * Create a Configuration from environment variables, applying defaults.
 *
 * @param env - Usually `process.env` after `dotenv/config` has run.
 */
export function ensureConfiguration(
  env: NodeJS.ProcessEnv = process.env
): Configuration {
  const parsed = environmentSchema.parse(env);
  return {
    port: parsed.PORT,
    mongoUri: parsed.MONGODB_ATLAS_URI,
    dbName: parsed.DB_NAME,
    collectionName: parsed.COLLECTION_NAME,
    jwtSecret: parsed.JWT_SECRET,
    jwtExpiresIn: parsed.JWT_EXPIRES_IN,
    bcryptRounds: parsed.BCRYPT_ROUNDS,
    generationModel: parsed.GENERATION_MODEL,
  };
}

export interface ChatModelOptions {
  streaming?: boolean;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Load a chat model from a fully specified name.
 * @param fullySpecifiedName - String in the format 'provider/model' or 'provider/account/provider/model'.
 */
export async function loadChatModel(
  fullySpecifiedName: string,
  options: ChatModelOptions = {}
): Promise<BaseChatModel> {
  const index = fullySpecifiedName.indexOf("/");
  if (index === -1) {
    // If there's no "/", assume it's just the model
    return await initChatModel(fullySpecifiedName, { ...options });
  } else {
    const provider = fullySpecifiedName.slice(0, index);
    const model = fullySpecifiedName.slice(index + 1);
    return await initChatModel(model, {
      modelProvider: provider,
      streaming: options.streaming ?? false,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });
  }
}
