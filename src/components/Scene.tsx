// ==========================
// Version 2 — src/components/Scene.tsx
// - Shared frame for every screen: centered title, extra header lines, divider, hint row
// - Keeps pages from re-implementing the header layout
// ==========================
import type { ReactNode } from "react";
import { Box, Text } from "ink";

export const WIDTH = 50;

type SceneProps = {
  title: string;
  lines?: string[];
  hint?: ReactNode;
  children?: ReactNode;
};

export default function Scene({ title, lines = [], hint, children }: SceneProps) {
  return (
    <Box flexDirection="column" width={WIDTH}>
      <Box justifyContent="center">
        <Text bold>{title}</Text>
      </Box>
      {lines.map((line, i) => (
        <Box key={`scene-line-${i}`} justifyContent="center">
          <Text>{line}</Text>
        </Box>
      ))}
      <Text>{"─".repeat(WIDTH)}</Text>
      {hint}
      <Text> </Text>
      {children}
    </Box>
  );
}

// ==========================
// End of Version 2 — src/components/Scene.tsx
// ==========================
