/**
 * One-line feedback message under a screen.
 */

import React from "react";
import { Box, Text } from "ink";
import { isRecoverable, isWorklogError } from "@worklog/core";

export type NoticeKind = "info" | "warning" | "error";

export interface NoticeState {
  kind: NoticeKind;
  text: string;
}

const COLORS: Record<NoticeKind, string> = {
  info: "green",
  warning: "yellow",
  error: "red",
};

export function Notice({
  notice,
}: {
  notice: NoticeState | null;
}): React.ReactElement | null {
  if (!notice) return null;
  return (
    <Box marginTop={1}>
      <Text color={COLORS[notice.kind]}>{notice.text}</Text>
    </Box>
  );
}

/** Map a thrown value to a notice: worklog errors other than corrupt storage are warnings. */
export function noticeFromError(error: unknown): NoticeState {
  if (isWorklogError(error)) {
    return {
      kind: isRecoverable(error.code) ? "warning" : "error",
      text: error.message,
    };
  }
  return {
    kind: "error",
    text: error instanceof Error ? error.message : String(error),
  };
}
