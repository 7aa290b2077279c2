import { SafeMirrorError } from "./errors";
import { fileExists } from "./filesystem";
import { writeConfigFile } from "./config";
import { renderConfigTemplate } from "./templates";

export async function initConfig(configPath: string): Promise<{ configPath: string }> {
  if (await fileExists(configPath)) {
    throw new SafeMirrorError(`Config already exists: ${configPath}`, "Usage");
  }
  await writeConfigFile(configPath, renderConfigTemplate());
  return { configPath };
}
