/**
 * Config command - Show configuration file location
 */

import { getUserConfigPath, loadDefaultConfig } from "../../utils";

export async function configCommand(): Promise<void> {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize the pager. Defaults:");
  console.log(JSON.stringify(await loadDefaultConfig(), null, 2));
}
