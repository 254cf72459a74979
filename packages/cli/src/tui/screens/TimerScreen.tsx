/**
 * Timer screen: live clock, start/pause/resume/stop and the comment prompt.
 */

import React, { useState } from "react";
import { Box, Text, useInput, useApp } from "ink";
import TextInput from "ink-text-input";
import {
  formatClock,
  toRecord,
  type FinalizedSession,
  type RecordStore,
  type SessionTimer,
} from "@worklog/core";
import {
  Header,
  Notice,
  StatusBadge,
  noticeFromError,
  type NoticeState,
} from "../components/index.js";
import { useElapsed } from "../hooks/useElapsed.js";
import { TIMER_WIDTH } from "../layout.js";

export interface TimerScreenProps {
  timer: SessionTimer;
  store: RecordStore;
  tickMs: number;
  onOpenRecords: () => void;
}

export function TimerScreen({
  timer,
  store,
  tickMs,
  onOpenRecords,
}: TimerScreenProps): React.ReactElement {
  const { exit } = useApp();
  const { elapsed, status, refresh } = useElapsed(timer, tickMs);

  const [notice, setNotice] = useState<NoticeState | null>(null);
  // Session waiting for its comment before it is saved
  const [pending, setPending] = useState<FinalizedSession | null>(null);
  const [comment, setComment] = useState("");

  const run = (action: () => void) => {
    try {
      action();
      setNotice(null);
    } catch (error) {
      setNotice(noticeFromError(error));
    }
    refresh();
  };

  const saveSession = (session: FinalizedSession, text: string) => {
    try {
      store.append(toRecord(session, text));
      setPending(null);
      setComment("");
      setNotice({ kind: "info", text: "Your work session has been saved." });
    } catch (error) {
      // Keep the session so saving can be retried
      setNotice(noticeFromError(error));
    }
  };

  useInput((input, key) => {
    if (pending) {
      // Esc saves without a comment, like cancelling the prompt
      if (key.escape) saveSession(pending, "");
      return;
    }

    switch (input) {
      case "s":
        run(() => timer.start());
        break;
      case "p":
        run(() => timer.pause());
        break;
      case "r":
        run(() => timer.resume());
        break;
      case "x":
        run(() => {
          setPending(timer.stop());
          setComment("");
        });
        break;
      case "e":
        onOpenRecords();
        break;
      case "q":
        if (timer.status === "idle") {
          exit();
        } else {
          setNotice({
            kind: "warning",
            text: "Stop the current session before quitting.",
          });
        }
        break;
    }
  });

  return (
    <Box flexDirection="column">
      <Header
        title="Work Hours Tracker"
        width={TIMER_WIDTH}
        hints={[
          { key: "s", label: "start" },
          { key: "p", label: "pause" },
          { key: "r", label: "resume" },
          { key: "x", label: "stop" },
          { key: "e", label: "edit" },
          { key: "q", label: "quit" },
        ]}
      />

      <Box marginTop={1} marginLeft={2} flexDirection="column">
        <Text bold>{formatClock(pending ? pending.accumulatedSeconds : elapsed)}</Text>
        <StatusBadge status={status} />
      </Box>

      {pending && (
        <Box marginTop={1}>
          <Text>Comment (optional): </Text>
          <TextInput
            value={comment}
            onChange={setComment}
            onSubmit={(text) => saveSession(pending, text)}
          />
          <Text dimColor> (Enter to save, Esc to skip)</Text>
        </Box>
      )}

      <Notice notice={notice} />
    </Box>
  );
}
