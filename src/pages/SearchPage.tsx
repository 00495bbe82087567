// ==========================
// Version 1 — src/pages/SearchPage.tsx
// - Live filter: query line + first matches
// ==========================
import { Text } from "ink";
import KeyHint from "../components/KeyHint";
import OptionList from "../components/OptionList";
import Scene from "../components/Scene";
import type { FilterView } from "../navigation/liveFilter";

export type SearchPageProps = {
  title: string;
  label: string;
  view: FilterView<string>;
};

export default function SearchPage({ title, label, view }: SearchPageProps) {
  return (
    <Scene title={title} hint={<KeyHint left={`${label}: ${view.query}`} right="ESC = Back | ENTER = Select" />}>
      {view.matches.length === 0 ? (
        <Text dimColor>No matches</Text>
      ) : (
        <OptionList items={view.matches} selected={view.selected} />
      )}
    </Scene>
  );
}

// ==========================
// End of Version 1 — src/pages/SearchPage.tsx
// ==========================
