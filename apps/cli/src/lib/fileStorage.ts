import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import type { StateStorage } from "zustand/middleware";
import { isNotFoundError } from "@vectorize-batch/core";

// One `<name>.json` file per persisted store, kept synchronous so the store hydrates on creation.
export function createFileStorage(dir: string): StateStorage {
  const fileFor = (name: string) => path.join(dir, `${name}.json`);

  return {
    getItem(name) {
      try {
        return readFileSync(fileFor(name), "utf8");
      } catch (error) {
        if (isNotFoundError(error)) {
          return null;
        }
        throw error;
      }
    },
    setItem(name, value) {
      mkdirSync(dir, { recursive: true });
      writeFileSync(fileFor(name), `${value}\n`, "utf8");
    },
    removeItem(name) {
      rmSync(fileFor(name), { force: true });
    }
  };
}
