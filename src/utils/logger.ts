import pino from "pino";
import { env } from "@/config/env";

function buildTargets(): pino.TransportTargetOptions[] {
  const targets: pino.TransportTargetOptions[] = [
    {
      target: "pino-pretty",
      level: env.LOG_LEVEL,
      options: {
        colorize: true,
        translateTime: "SYS:HH:MM:ss",
        ignore: "pid,hostname",
        destination: 1,
      },
    },
  ];

  if (env.LOG_FILE) {
    targets.push({
      target: "pino/file",
      level: env.LOG_LEVEL,
      options: { destination: env.LOG_FILE, mkdir: true, append: true },
    });
  }

  return targets;
}

export const logger =
  env.NODE_ENV === "test"
    ? pino({ level: "silent" })
    : pino({ level: env.LOG_LEVEL }, pino.transport({ targets: buildTargets() }));

export type Logger = typeof logger;
