/**
 * Config command - Show configuration file and backgrounds locations
 */

import { getBackgroundsDir, getUserConfigPath } from "../../utils";

export function configCommand(): void {
  console.log("User configuration file location:");
  console.log(getUserConfigPath());

  const override = process.env.CARDCONVERT_CONFIG;
  if (override) {
    console.log("\nConfiguration override ($CARDCONVERT_CONFIG):");
    console.log(override);
  }

  console.log("\nBackgrounds folder:");
  console.log(getBackgroundsDir());

  console.log("\nCreate the configuration file to customize conversion settings.");
  console.log("See src/config/default.json for available options.");
}
