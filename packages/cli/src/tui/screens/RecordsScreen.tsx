/**
 * Records screen: browse, edit and delete stored sessions.
 */

import React, { useState, useEffect, useCallback } from "react";
import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";
import {
  applyEdit,
  DISPLAY_FORMAT,
  isoToDisplay,
  toEditableFields,
  validateAndBuild,
  type EditableFields,
  type RecordStore,
  type WorkRecord,
} from "@worklog/core";
import {
  Header,
  Notice,
  Table,
  noticeFromError,
  type Column,
  type NoticeState,
} from "../components/index.js";
import { tableWidth } from "../layout.js";

export interface RecordsScreenProps {
  store: RecordStore;
  onBack: () => void;
}

type Mode = "list" | "edit" | "confirmDelete";

const FIELDS: Array<{ name: keyof EditableFields; label: string }> = [
  { name: "start", label: `Start Time (${DISPLAY_FORMAT})` },
  { name: "end", label: `End Time (${DISPLAY_FORMAT})` },
  { name: "comment", label: "Comment" },
];

const columns: Column<WorkRecord>[] = [
  { key: "index", header: "#", width: 5, render: (_, i) => String(i) },
  {
    key: "start",
    header: "Start",
    width: 21,
    render: (row) => isoToDisplay(row.startTime),
  },
  {
    key: "end",
    header: "End",
    width: 21,
    render: (row) => isoToDisplay(row.endTime),
  },
  { key: "comment", header: "Comment", width: 30, render: (row) => row.comment },
];

export function RecordsScreen({
  store,
  onBack,
}: RecordsScreenProps): React.ReactElement {
  // Positions shown here are the ones edit/delete address
  const [records, setRecords] = useState<WorkRecord[]>([]);
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [mode, setMode] = useState<Mode>("list");
  const [fields, setFields] = useState<EditableFields>({
    start: "",
    end: "",
    comment: "",
  });
  const [focusedField, setFocusedField] = useState(0);
  const [notice, setNotice] = useState<NoticeState | null>(null);

  const loadRecords = useCallback(() => {
    try {
      setRecords(store.load());
    } catch (error) {
      setRecords([]);
      setNotice(noticeFromError(error));
    }
  }, [store]);

  useEffect(() => {
    loadRecords();
  }, [loadRecords]);

  useEffect(() => {
    if (selectedIndex >= records.length) {
      setSelectedIndex(Math.max(0, records.length - 1));
    }
  }, [records.length, selectedIndex]);

  const saveEdit = () => {
    try {
      const updated = validateAndBuild(fields.start, fields.end, fields.comment);
      setRecords(applyEdit(store, selectedIndex, updated, records));
      setMode("list");
      setNotice({ kind: "info", text: "Record updated." });
    } catch (error) {
      // Stay in the form so the input can be corrected
      setNotice(noticeFromError(error));
    }
  };

  const confirmDelete = () => {
    try {
      store.deleteAt(selectedIndex, records);
      setNotice({ kind: "info", text: "Record deleted successfully." });
    } catch (error) {
      setNotice(noticeFromError(error));
    }
    setMode("list");
    loadRecords();
  };

  useInput((input, key) => {
    if (mode === "edit") {
      if (key.escape) {
        setMode("list");
        setNotice(null);
      } else if (key.tab || key.downArrow) {
        setFocusedField((prev) => (prev + 1) % FIELDS.length);
      } else if (key.upArrow) {
        setFocusedField((prev) => (prev + FIELDS.length - 1) % FIELDS.length);
      }
      return;
    }

    if (mode === "confirmDelete") {
      if (input === "y") {
        confirmDelete();
      } else if (input === "n" || key.escape) {
        setMode("list");
      }
      return;
    }

    if (key.escape || input === "b") {
      onBack();
      return;
    }

    if (input === "r") {
      setNotice(null);
      loadRecords();
      return;
    }

    if (key.upArrow) {
      setSelectedIndex((prev) => Math.max(0, prev - 1));
    } else if (key.downArrow) {
      setSelectedIndex((prev) =>
        Math.max(0, Math.min(records.length - 1, prev + 1))
      );
    } else if (input === "e" || input === "d") {
      const selected = records[selectedIndex];
      if (!selected) {
        setNotice({ kind: "warning", text: "Please select a record first." });
        return;
      }
      setNotice(null);
      if (input === "e") {
        setFields(toEditableFields(selected));
        setFocusedField(0);
        setMode("edit");
      } else {
        setMode("confirmDelete");
      }
    }
  });

  return (
    <Box flexDirection="column">
      <Header
        title="Edit Time Records"
        width={tableWidth(columns)}
        hints={[
          { key: "e", label: "edit" },
          { key: "d", label: "delete" },
          { key: "r", label: "reload" },
          { key: "esc", label: "back" },
        ]}
      />

      <Box marginTop={1}>
        <Table
          columns={columns}
          data={records}
          selectedIndex={selectedIndex}
          emptyText="No time records available."
        />
      </Box>

      {mode === "edit" && (
        <Box marginTop={1} flexDirection="column">
          {FIELDS.map((field, i) => (
            <Box key={field.name}>
              <Box width={36}>
                <Text color={i === focusedField ? "cyan" : undefined}>
                  {field.label}:
                </Text>
              </Box>
              <TextInput
                value={fields[field.name]}
                focus={i === focusedField}
                onChange={(value) =>
                  setFields((prev) => ({ ...prev, [field.name]: value }))
                }
                onSubmit={saveEdit}
              />
            </Box>
          ))}
          <Text dimColor>Tab to move, Enter to save, Esc to cancel</Text>
        </Box>
      )}

      {mode === "confirmDelete" && (
        <Box marginTop={1}>
          <Text color="yellow">
            Are you sure you want to delete record {selectedIndex}? (y/n)
          </Text>
        </Box>
      )}

      <Notice notice={notice} />
    </Box>
  );
}
