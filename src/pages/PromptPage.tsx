// ==========================
// Version 1 — src/pages/PromptPage.tsx
// - Text entry (habit names, dates); inverse block marks the cursor
// ==========================
import { Text } from "ink";
import Scene from "../components/Scene";

export type PromptPageProps = {
  title: string;
  label: string;
  value: string;
};

export default function PromptPage({ title, label, value }: PromptPageProps) {
  return (
    <Scene title={title} hint={<Text dimColor>ESC = Back | ENTER = Save</Text>}>
      <Text>{label}</Text>
      <Text>
        {value}
        <Text inverse> </Text>
      </Text>
    </Scene>
  );
}

// ==========================
// End of Version 1 — src/pages/PromptPage.tsx
// ==========================
