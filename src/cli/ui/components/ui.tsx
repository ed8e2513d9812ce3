/**
 * @file Minimal UI primitives for consistent CLI styling
 */
import React from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";

/** Render a cyan title with optional gray subtitles. */
export function Title({ label, subtitle }: { label: string; subtitle?: string | string[] }) {
  const subs = Array.isArray(subtitle) ? subtitle : subtitle ? [subtitle] : [];
  return (
    <Box flexDirection="column">
      <Text color="cyan">{label}</Text>
      {subs.map((s, i) => (
        <Text key={i} color="gray">
          {s}
        </Text>
      ))}
    </Box>
  );
}

/** Render a horizontal line fitting the terminal width (approx). */
export function HLine({ width, char = "─" }: { width?: number; char?: string }) {
  const cols = width ?? (process.stdout?.columns ? Math.max(8, process.stdout.columns - 4) : 60);
  return <Text color="gray">{char.repeat(cols)}</Text>;
}

/** Render a gray hint line. */
export function Hint({ children }: { children: string }) {
  return <Text color="gray">{children}</Text>;
}

/** Spinner with a message while startup IO runs. */
export function Loading({ message = "Loading..." }: { message?: string }) {
  return (
    <Box>
      <Text>
        <Spinner type="dots" /> {message}
      </Text>
    </Box>
  );
}
