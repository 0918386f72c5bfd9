import path from "node:path";
import { render, useApp } from "ink";
import { FilePicker } from "./components/FilePicker";
import { VectorizeForm } from "./components/VectorizeForm";
import { createBatchQueue, createVtracerConverter, submitBatch } from "./batchWorker";
import { createFileStorage } from "./lib/fileStorage";
import { createSessionStore } from "./store/session";

export type FormContext = {
  cwd: string;
  files: string[];
  outputDir?: string;
  vtracerBin: string;
  settingsDir: string;
};

function assertInteractive(): void {
  if (!process.stdin.isTTY) {
    throw new Error("Interactive mode needs a terminal; pass input files as arguments instead.");
  }
}

function StandalonePicker({ startDir, onDone }: { startDir: string; onDone: (paths: string[]) => void }) {
  const { exit } = useApp();
  return (
    <FilePicker
      startDir={startDir}
      onDone={(paths) => {
        onDone(paths ?? []);
        exit();
      }}
    />
  );
}

export async function pickFilesInteractively(startDir: string): Promise<string[]> {
  assertInteractive();
  let picked: string[] = [];
  const instance = render(
    <StandalonePicker
      startDir={startDir}
      onDone={(paths) => {
        picked = paths;
      }}
    />
  );
  await instance.waitUntilExit();
  return picked;
}

export async function launchForm(context: FormContext): Promise<number> {
  assertInteractive();
  const store = createSessionStore({
    storage: createFileStorage(context.settingsDir),
    outputDir: context.cwd
  });
  if (context.outputDir) {
    store.getState().setOutputDir(context.outputDir);
  }
  if (context.files.length > 0) {
    store.getState().setFiles(context.files.map((file) => path.resolve(context.cwd, file)));
  }

  const queue = createBatchQueue(createVtracerConverter(context.vtracerBin));
  const unsubscribe = queue.onEvent(store.getState().applyEvent);

  const instance = render(<VectorizeForm store={store} startDir={context.cwd} onStart={() => submitBatch(store, queue)} />);
  try {
    await instance.waitUntilExit();
  } finally {
    unsubscribe();
  }
  return 0;
}
