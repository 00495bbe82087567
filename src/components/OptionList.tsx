// ==========================
// Version 1 — src/components/OptionList.tsx
// - Vertical option list with a ">" marker on the selected row
// ==========================
import { Box, Text } from "ink";

export default function OptionList({ items, selected }: { items: string[]; selected: number }) {
  return (
    <Box flexDirection="column">
      {items.map((label, i) => (
        <Text key={`${i}-${label}`}>
          {i === selected ? ">" : " "} {label}
        </Text>
      ))}
    </Box>
  );
}

// ==========================
// End of Version 1 — src/components/OptionList.tsx
// ==========================
