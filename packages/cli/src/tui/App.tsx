/**
 * Main TUI application with screen routing.
 * The timer outlives screen changes, so a session keeps running while
 * records are edited.
 */

import React, { useState } from "react";
import { SessionTimer, type RecordStore } from "@worklog/core";
import { TimerScreen, RecordsScreen } from "./screens/index.js";

type Screen = "timer" | "records";

export interface AppProps {
  store: RecordStore;
  tickMs: number;
  timer?: SessionTimer;
}

export function App({ store, tickMs, timer }: AppProps): React.ReactElement {
  const [sessionTimer] = useState(() => timer ?? new SessionTimer());
  const [screen, setScreen] = useState<Screen>("timer");

  switch (screen) {
    case "records":
      return <RecordsScreen store={store} onBack={() => setScreen("timer")} />;

    case "timer":
      return (
        <TimerScreen
          timer={sessionTimer}
          store={store}
          tickMs={tickMs}
          onOpenRecords={() => setScreen("records")}
        />
      );
  }
}
