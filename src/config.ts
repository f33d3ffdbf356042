import OpenAI from "openai";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const DEFAULT_MODEL = "qwen3:4b";
export const DEFAULT_BASE_URL = "http://localhost:11434/v1";

const EnvSchema = z.object({
    OLLAMA_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
    // Ollama ignores the key, the client refuses to start without one.
    OLLAMA_API_KEY: z.string().min(1).default("ollama"),
    MODEL: z.string().min(1).default(DEFAULT_MODEL),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type Config = {
    baseURL: string;
    apiKey: string;
    model: string;
    port: number;
    logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        );
    }

    return {
        baseURL: parsed.data.OLLAMA_BASE_URL,
        apiKey: parsed.data.OLLAMA_API_KEY,
        model: parsed.data.MODEL,
        port: parsed.data.PORT,
        logLevel: parsed.data.LOG_LEVEL,
    };
}

export function createClient(config: Config): OpenAI {
    return new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
}
