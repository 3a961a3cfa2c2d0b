export interface RunnerConfig {
  simTickHz: number;
  runSeconds: number;
  realtime: boolean;
  fieldWidth: number;
  fieldHeight: number;
  logEverySeconds: number;
}

export class RunnerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunnerConfigError";
  }
}

// The whole string must parse: "60abc" and "2.5" for an integer are rejected.
function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: string): number {
  const raw = env[key] ?? fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || value <= 0) {
    throw new RunnerConfigError(key + " must be a positive number, got " + JSON.stringify(raw));
  }
  return value;
}

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: string): number {
  const raw = env[key] ?? fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isInteger(value) || value < 1) {
    throw new RunnerConfigError(key + " must be a positive integer, got " + JSON.stringify(raw));
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
  if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  throw new RunnerConfigError(key + " must be a boolean, got " + JSON.stringify(raw));
}

export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  return {
    simTickHz: readInteger(env, "SIM_TICK_HZ", "60"),
    runSeconds: readNumber(env, "RUN_SECONDS", "60"),
    realtime: readBoolean(env, "REALTIME", false),
    fieldWidth: readNumber(env, "FIELD_WIDTH", "960"),
    fieldHeight: readNumber(env, "FIELD_HEIGHT", "640"),
    logEverySeconds: readNumber(env, "LOG_EVERY_SECONDS", "5"),
  };
}
