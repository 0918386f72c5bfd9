import { useEffect, useState } from "react";
import { Box, Text, useInput } from "ink";
import { toErrorMessage } from "@vectorize-batch/core";
import { listDirectory, visibleWindow } from "../lib/browse";
import type { DirectoryEntry } from "../lib/browse";

const PAGE_SIZE = 15;

type FilePickerProps = {
  startDir: string;
  initialSelection?: string[];
  /** Receives the confirmed selection, or `null` when the picker is cancelled. */
  onDone: (paths: string[] | null) => void;
};

export function FilePicker({ startDir, initialSelection = [], onDone }: FilePickerProps) {
  const [dir, setDir] = useState(startDir);
  const [entries, setEntries] = useState<DirectoryEntry[] | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [cursor, setCursor] = useState(0);
  const [selected, setSelected] = useState<string[]>(initialSelection);

  useEffect(() => {
    let active = true;
    setEntries(null);
    setError(null);
    listDirectory(dir)
      .then((next) => {
        if (active) {
          setEntries(next);
          setCursor(0);
        }
      })
      .catch((err: unknown) => {
        if (active) {
          setError(toErrorMessage(err, "Cannot read directory"));
          setEntries([]);
        }
      });
    return () => {
      active = false;
    };
  }, [dir]);

  const toggle = (entry: DirectoryEntry) => {
    setSelected((current) =>
      current.includes(entry.path) ? current.filter((item) => item !== entry.path) : [...current, entry.path]
    );
  };

  useInput((input, key) => {
    if (key.escape || input === "q") {
      onDone(null);
      return;
    }
    if (input === "d") {
      onDone(selected);
      return;
    }
    if (!entries || entries.length === 0) {
      return;
    }
    if (key.upArrow) {
      setCursor((current) => (current - 1 + entries.length) % entries.length);
      return;
    }
    if (key.downArrow) {
      setCursor((current) => (current + 1) % entries.length);
      return;
    }

    const entry = entries[cursor];
    if (!entry) {
      return;
    }
    if (key.return && entry.kind === "directory") {
      setDir(entry.path);
      return;
    }
    if ((key.return || input === " ") && entry.kind === "file") {
      toggle(entry);
    }
  });

  const { start, end } = visibleWindow(entries?.length ?? 0, cursor, PAGE_SIZE);

  return (
    <Box flexDirection="column" borderStyle="round" paddingX={1}>
      <Text bold>Select images to vectorize</Text>
      <Text dimColor>{dir}</Text>
      {entries === null ? <Text>Loading…</Text> : null}
      {error ? <Text color="red">{error}</Text> : null}
      {entries !== null && entries.length === 0 && !error ? <Text dimColor>No images here.</Text> : null}
      {(entries ?? []).slice(start, end).map((entry, offset) => {
        const focused = start + offset === cursor;
        const mark = entry.kind === "directory" ? "   " : selected.includes(entry.path) ? "[x]" : "[ ]";
        const name = entry.kind === "directory" ? `${entry.name}/` : entry.name;
        return (
          <Text key={entry.path} color={focused ? "cyan" : undefined}>
            {focused ? "›" : " "} {mark} {name}
          </Text>
        );
      })}
      <Box marginTop={1}>
        <Text dimColor>
          {selected.length} selected · ↑/↓ move · enter open · space toggle · d done · esc cancel
        </Text>
      </Box>
    </Box>
  );
}
