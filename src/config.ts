import { z } from "zod";
import { logError } from "./logger";

/**
 * Gateway configuration, read once from the environment.
 * The entry point loads `.env` through dotenv before this module is imported.
 */
const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8082),
  ORDER_QUEUE_STORE: z.enum(["firestore", "memory"]).default("firestore"),
  ORDER_QUEUE_KEY: z.string().min(1).default("active_order_queue"),
  ORDER_QUEUE_COLLECTION: z.string().min(1).default("orderQueues"),
  LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MAX_WS_PAYLOAD_BYTES: z.coerce.number().int().positive().default(65536),
});

export type GatewayConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    logError("[config] Invalid environment, falling back to defaults:", parsed.error.flatten().fieldErrors);
    return envSchema.parse({});
  }
  return parsed.data;
}
