import fs from "fs";
import path from "path";
import * as dotenv from "dotenv";

export enum EnvState {
  PROD = "production",
  DEV = "development",
  STAGE = "staging",
  TEST = "test",
}

const parseEnvState = (value: string | undefined): EnvState => {
  switch (value) {
    case EnvState.PROD:
      return EnvState.PROD;
    case EnvState.STAGE:
      return EnvState.STAGE;
    case EnvState.TEST:
      return EnvState.TEST;
    default:
      return EnvState.DEV;
  }
};

export const NODE_ENV: EnvState = parseEnvState(process.env.NODE_ENV);

export const isProduction = () => NODE_ENV === EnvState.PROD;
export const isTest = () => NODE_ENV === EnvState.TEST;

let _resolvedPath: string | null | undefined;

export function getEnvFileName(): string | null {
  if (_resolvedPath !== undefined) return _resolvedPath;
  const candidate = `.env.${NODE_ENV}`;
  const full = path.resolve(process.cwd(), candidate);
  _resolvedPath = fs.existsSync(full) ? candidate : null;
  return _resolvedPath;
}

export function loadDotenv(): string | null {
  const envFile = getEnvFileName();
  if (envFile) dotenv.config({ path: envFile });
  else dotenv.config(); // fallback to .env if present
  return envFile;
}
