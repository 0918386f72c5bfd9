import { useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import { useStore } from "zustand";
import type { ParameterSet } from "@vectorize-batch/core";
import {
  commitNumericDraft,
  cycleParameter,
  formFields,
  isNumericInput,
  moveFocus
} from "../lib/fields";
import type { FormField } from "../lib/fields";
import type { SessionStore } from "../store/session";
import { FilePicker } from "./FilePicker";
import { StatusLog } from "./StatusLog";

const LOG_HEIGHT = 10;

type VectorizeFormProps = {
  store: SessionStore;
  startDir: string;
  onStart: () => void;
};

function describeFiles(files: string[]): string {
  if (files.length === 0) {
    return "none selected (enter to browse)";
  }
  if (files.length === 1) {
    return files[0] ?? "";
  }
  return `${files.length} files selected (enter to change)`;
}

function fieldValue(field: FormField, parameters: ParameterSet, files: string[], outputDir: string): string {
  switch (field.kind) {
    case "files":
      return describeFiles(files);
    case "outputDir":
      return outputDir;
    case "choice":
      return `‹ ${parameters[field.key]} ›`;
    case "number":
      return String(parameters[field.key]);
    case "start":
      return "";
  }
}

export function VectorizeForm({ store, startDir, onStart }: VectorizeFormProps) {
  const { exit } = useApp();
  const files = useStore(store, (state) => state.files);
  const outputDir = useStore(store, (state) => state.outputDir);
  const parameters = useStore(store, (state) => state.parameters);
  const log = useStore(store, (state) => state.log);
  const running = useStore(store, (state) => state.running);

  const [focus, setFocus] = useState(0);
  const [draft, setDraft] = useState<string | null>(null);
  const [picking, setPicking] = useState(false);

  const field = formFields[focus];

  const commitDraft = () => {
    if (draft === null || field?.kind !== "number") {
      return;
    }
    const { parameters: current, updateParameters } = store.getState();
    const next = { ...current };
    next[field.key] = commitNumericDraft(draft, current[field.key], field.integer);
    updateParameters(next);
    setDraft(null);
  };

  useInput(
    (input, key) => {
      if (!field) {
        return;
      }
      if (key.escape) {
        if (running) {
          store.getState().appendLog("info", ["Wait for the running batch to finish before quitting."]);
          return;
        }
        exit();
        return;
      }
      if (key.upArrow || key.downArrow || key.tab) {
        commitDraft();
        setFocus((current) => moveFocus(current, key.upArrow || (key.tab && key.shift) ? -1 : 1));
        return;
      }

      const session = store.getState();
      switch (field.kind) {
        case "files":
          if (key.return) {
            setPicking(true);
          }
          return;
        case "outputDir":
          if (key.backspace || key.delete) {
            session.setOutputDir(session.outputDir.slice(0, -1));
          } else if (input && !key.ctrl && !key.meta && !key.return) {
            session.setOutputDir(session.outputDir + input);
          }
          return;
        case "choice":
          if (key.leftArrow || key.rightArrow) {
            const next = cycleParameter(session.parameters, field.key, key.leftArrow ? -1 : 1);
            session.updateParameters(next);
          }
          return;
        case "number":
          if (key.return) {
            commitDraft();
          } else if (key.backspace || key.delete) {
            setDraft((current) => (current ?? String(session.parameters[field.key])).slice(0, -1));
          } else if (isNumericInput(input)) {
            setDraft((current) => (current ?? "") + input);
          }
          return;
        case "start":
          if (key.return) {
            onStart();
          }
          return;
      }
    },
    { isActive: !picking }
  );

  if (picking) {
    return (
      <FilePicker
        startDir={startDir}
        initialSelection={files}
        onDone={(paths) => {
          if (paths !== null) {
            store.getState().setFiles(paths);
          }
          setPicking(false);
        }}
      />
    );
  }

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text bold>vtracer image vectorizer</Text>
      <Box flexDirection="column" marginY={1}>
        {formFields.map((item, index) => {
          const focused = index === focus;
          if (item.kind === "start") {
            return (
              <Box key={item.label} marginTop={1}>
                <Text color={focused ? "green" : undefined} inverse={focused}>
                  {` ${running ? "Vectorizing…" : item.label} `}
                </Text>
              </Box>
            );
          }
          const value =
            focused && item.kind === "number" && draft !== null
              ? `${draft}_`
              : fieldValue(item, parameters, files, outputDir);
          return (
            <Box key={item.label}>
              <Box width={20}>
                <Text color={focused ? "cyan" : undefined}>
                  {focused ? "›" : " "} {item.label}:
                </Text>
              </Box>
              <Text>{value}</Text>
            </Box>
          );
        })}
      </Box>
      <StatusLog lines={log} height={LOG_HEIGHT} />
      <Text dimColor>↑/↓ move · ←/→ change · type to edit · enter select · esc quit</Text>
    </Box>
  );
}
