import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand";
import { createJSONStorage, persist } from "zustand/middleware";
import type { StateStorage } from "zustand/middleware";
import { defaultParameterSet } from "@vectorize-batch/core";
import type { BatchEvent, BatchResult, ParameterSet } from "@vectorize-batch/core";
import type { TaskEvent } from "@vectorize-batch/queue";
import { SETTINGS_STORE_NAME } from "../constants";
import { describeBatchEvent } from "../reporter";
import type { LogLevel } from "../reporter";
import { normalizeStoredSettings } from "../lib/settings";

export const LOG_CAPACITY = 200;

export type LogLine = {
  level: LogLevel;
  text: string;
};

export type BatchQueueEvent = TaskEvent<BatchResult, BatchEvent>;

export type SessionState = {
  files: string[];
  outputDir: string;
  parameters: ParameterSet;
  log: LogLine[];
  running: boolean;
  setFiles: (files: string[]) => void;
  setOutputDir: (outputDir: string) => void;
  updateParameters: (patch: Partial<ParameterSet>) => void;
  appendLog: (level: LogLevel, lines: string[]) => void;
  applyEvent: (event: BatchQueueEvent) => void;
};

export type SessionStore = StoreApi<SessionState>;

export type SessionStoreOptions = {
  storage: StateStorage;
  outputDir: string;
};

function appendLines(log: LogLine[], level: LogLevel, lines: string[]): LogLine[] {
  const next = [...log, ...lines.map((text) => ({ level, text }))];
  return next.length > LOG_CAPACITY ? next.slice(next.length - LOG_CAPACITY) : next;
}

export function createSessionStore(options: SessionStoreOptions): SessionStore {
  return createStore<SessionState>()(
    persist(
      (set) => ({
        files: [],
        outputDir: options.outputDir,
        parameters: { ...defaultParameterSet },
        log: [],
        running: false,

        setFiles(files) {
          set({ files: [...files] });
        },

        setOutputDir(outputDir) {
          set({ outputDir });
        },

        updateParameters(patch) {
          set((state) => ({
            parameters: {
              ...state.parameters,
              ...patch
            }
          }));
        },

        appendLog(level, lines) {
          set((state) => ({ log: appendLines(state.log, level, lines) }));
        },

        applyEvent(event) {
          switch (event.type) {
            case "queued":
              return;
            case "start":
              set({ running: true });
              return;
            case "progress": {
              const report = describeBatchEvent(event.progress);
              set((state) => ({ log: appendLines(state.log, report.level, report.lines) }));
              return;
            }
            case "done":
              set({ running: false });
              return;
            case "error":
              set((state) => ({
                running: false,
                log: appendLines(state.log, "error", [`Batch stopped: ${event.message}`])
              }));
              return;
            case "idle":
              set({ running: false });
              return;
          }
        }
      }),
      {
        name: SETTINGS_STORE_NAME,
        storage: createJSONStorage(() => options.storage),
        partialize: (state) => ({
          outputDir: state.outputDir,
          parameters: state.parameters
        }),
        merge: (persisted, current) => {
          if (persisted === undefined) {
            return current;
          }
          const stored = normalizeStoredSettings(persisted);
          return {
            ...current,
            outputDir: stored.outputDir ?? current.outputDir,
            parameters: stored.parameters
          };
        }
      }
    )
  );
}
