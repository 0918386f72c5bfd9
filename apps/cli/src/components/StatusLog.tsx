import { Box, Text } from "ink";
import type { LogLine } from "../store/session";

type StatusLogProps = {
  lines: LogLine[];
  height: number;
};

export function StatusLog({ lines, height }: StatusLogProps) {
  const visible = lines.slice(-height);

  return (
    <Box flexDirection="column" borderStyle="single" paddingX={1} minHeight={height + 2}>
      {visible.length === 0 ? <Text dimColor>Status messages appear here.</Text> : null}
      {visible.map((line, index) => (
        <Text key={`${lines.length - visible.length + index}`} color={line.level === "error" ? "red" : undefined}>
          {line.text || " "}
        </Text>
      ))}
    </Box>
  );
}
