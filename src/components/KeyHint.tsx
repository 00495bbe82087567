// ==========================
// Version 1 — src/components/KeyHint.tsx
// - "Page x of y" on the left, key help on the right (one row, full width)
// ==========================
import { Box, Text } from "ink";

export default function KeyHint({ left, right }: { left: string; right: string }) {
  return (
    <Box justifyContent="space-between">
      <Text>{left}</Text>
      <Text dimColor>{right}</Text>
    </Box>
  );
}

// ==========================
// End of Version 1 — src/components/KeyHint.tsx
// ==========================
