import { ViewerConfigSchema, ViewerConfig } from "./viewerConfig";
import { readJson } from "../utils/fs";

export async function loadViewerConfig(configPath: string): Promise<ViewerConfig> {
  const data = await readJson(configPath);
  return ViewerConfigSchema.parse(data);
}

export interface ViewerCredentials {
  username: string;
  password: string;
}

export function readCredentials(usernameEnv: string, passwordEnv: string): ViewerCredentials {
  const username = process.env[usernameEnv];
  if (!username) {
    throw new Error(`Missing viewer username in env var ${usernameEnv}`);
  }
  const password = process.env[passwordEnv];
  if (!password) {
    throw new Error(`Missing viewer password in env var ${passwordEnv}`);
  }
  return { username, password };
}
