import type { FastifyBaseLogger } from "fastify";

/** The slice of the Fastify (pino) logger the engine writes to. */
export type EngineLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
