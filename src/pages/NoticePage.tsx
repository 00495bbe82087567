// ==========================
// Version 1 — src/pages/NoticePage.tsx
// - Outcome message after every action; dismissed with enter/escape
// ==========================
import { Text } from "ink";
import Scene from "../components/Scene";

export const CONTINUE_HINT = "Press Enter to continue...";

export type NoticePageProps = {
  title: string;
  message: string;
};

export default function NoticePage({ title, message }: NoticePageProps) {
  return (
    <Scene title={title}>
      <Text>{message}</Text>
      <Text dimColor>{CONTINUE_HINT}</Text>
    </Scene>
  );
}

// ==========================
// End of Version 1 — src/pages/NoticePage.tsx
// ==========================
