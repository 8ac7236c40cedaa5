import { join } from "path";
import { env } from "./env.js";

export const WORKSPACE_ROOT = env.DATA_DIR;

export function getWorkspaceConfigPath(): string {
  return join(WORKSPACE_ROOT, "config.json");
}

export function getWorkspacePicturesDir(): string {
  return join(WORKSPACE_ROOT, "pictures");
}
