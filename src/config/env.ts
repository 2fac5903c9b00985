// config/env.ts
// Intent: Single place where process environment is read and typed
import dotenv from "dotenv";

dotenv.config();

export interface FlowConfig {
  // Absolute tolerance used when comparing summed mass flows
  flowTolerance: number;
  perfEnabled: boolean;
}

export const DEFAULT_FLOW_TOLERANCE = 0.01;

function parseTolerance(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return DEFAULT_FLOW_TOLERANCE;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : DEFAULT_FLOW_TOLERANCE;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FlowConfig {
  return {
    flowTolerance: parseTolerance(env.FLOW_TOLERANCE),
    perfEnabled: env.PERF_ENABLED !== "false",
  };
}

export const config = loadConfig();
