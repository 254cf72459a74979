/**
 * Timer status indicator.
 */

import React from "react";
import { Text } from "ink";
import type { TimerStatus } from "@worklog/core";

export interface StatusBadgeProps {
  status: TimerStatus;
}

export function StatusBadge({ status }: StatusBadgeProps): React.ReactElement {
  switch (status) {
    case "running":
      return (
        <Text>
          <Text color="green">●</Text> <Text color="green">Running</Text>
        </Text>
      );
    case "paused":
      return (
        <Text>
          <Text color="yellow">●</Text> <Text color="yellow">Paused</Text>
        </Text>
      );
    case "idle":
      return (
        <Text>
          <Text color="gray">○</Text> <Text color="gray">Idle</Text>
        </Text>
      );
  }
}
