import os from "node:os";
import path from "node:path";

export const PROGRAM_NAME = "vectorize-batch";
export const PROGRAM_VERSION = "0.1.0";

export const SETTINGS_STORE_NAME = "settings";

export const installGuidance = [
  "To install vtracer:",
  "1. Install Rust: https://rustup.rs/",
  "2. Install vtracer: cargo install vtracer",
  "3. Or download prebuilt binaries from: https://github.com/visioncortex/vtracer",
  "Set VTRACER_BIN to use a binary outside PATH."
];

export function resolveSettingsDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.VECTORIZE_BATCH_CONFIG_DIR?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const base = env.XDG_CONFIG_HOME?.trim() || path.join(os.homedir(), ".config");
  return path.join(base, PROGRAM_NAME);
}
