import pino from "pino";

import { env } from "../config/env.js";

const defaultLevel = env.NODE_ENV === "production" ? "info" : env.NODE_ENV === "test" ? "silent" : "debug";

export const logger =
  env.NODE_ENV === "development"
    ? pino({
        level: env.LOG_LEVEL ?? defaultLevel,
        transport: {
          target: "pino/file",
          options: {
            destination: 1
          }
        }
      })
    : pino({
        level: env.LOG_LEVEL ?? defaultLevel
      });
