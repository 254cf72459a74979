/**
 * Timer command - interactive session timer and record editor.
 */

import { loadConfig } from "@worklog/core";
import { openStore, type StoreCommandOptions } from "./shared.js";

export async function timerCommand(
  options: StoreCommandOptions
): Promise<void> {
  const config = loadConfig({ dataFile: options.file });
  const store = openStore(options);

  // Dynamic imports to avoid loading React unless needed
  const { render } = await import("ink");
  const { default: React } = await import("react");
  const { App } = await import("../tui/App.js");

  const { waitUntilExit } = render(
    React.createElement(App, { store, tickMs: config.tickMs })
  );

  await waitUntilExit();
}
