/**
 * Scrollable table of rows with a highlighted selection.
 */

import React from "react";
import { Box, Text } from "ink";
import { MARKER_WIDTH } from "../layout.js";

export interface Column<T> {
  key: string;
  header: string;
  width: number;
  render: (row: T, index: number) => string;
}

export interface TableProps<T> {
  columns: Column<T>[];
  data: T[];
  selectedIndex: number;
  maxRows?: number;
  emptyText?: string;
}

export function Table<T>({
  columns,
  data,
  selectedIndex,
  maxRows = 12,
  emptyText = "Nothing to show",
}: TableProps<T>): React.ReactElement {
  if (data.length === 0) {
    return <Text dimColor>{emptyText}</Text>;
  }

  // Keep the selected row near the middle once the list scrolls
  const scrollOffset = Math.max(
    0,
    Math.min(selectedIndex - Math.floor(maxRows / 2), data.length - maxRows)
  );
  const visibleData = data.slice(scrollOffset, scrollOffset + maxRows);

  return (
    <Box flexDirection="column">
      <Box>
        <Box width={MARKER_WIDTH} />
        {columns.map((col) => (
          <Box key={col.key} width={col.width}>
            <Text bold dimColor>
              {col.header}
            </Text>
          </Box>
        ))}
      </Box>

      {visibleData.map((row, i) => {
        const actualIndex = scrollOffset + i;
        const isSelected = actualIndex === selectedIndex;

        return (
          <Box key={actualIndex}>
            <Box width={MARKER_WIDTH}>
              <Text color="cyan">{isSelected ? ">" : " "}</Text>
            </Box>
            {columns.map((col) => (
              <Box key={col.key} width={col.width}>
                <Text color={isSelected ? "cyan" : undefined} wrap="truncate">
                  {col.render(row, actualIndex)}
                </Text>
              </Box>
            ))}
          </Box>
        );
      })}

      {data.length > maxRows && (
        <Text dimColor>
          {"  "}Showing {scrollOffset + 1}-
          {Math.min(scrollOffset + maxRows, data.length)} of {data.length}
        </Text>
      )}
    </Box>
  );
}
