// ==========================
// Version 2 — src/pages/ListPage.tsx
// - One page of a paged list (habits, records)
// - Header hint: "Page x of y" + key help
// ==========================
import KeyHint from "../components/KeyHint";
import OptionList from "../components/OptionList";
import Scene from "../components/Scene";
import type { PagerView } from "../navigation/pager";

export const LIST_KEYS = "ESC = Back | ENTER = Select";

export type ListPageProps = {
  title: string;
  view: PagerView<string>;
};

export default function ListPage({ title, view }: ListPageProps) {
  return (
    <Scene title={title} hint={<KeyHint left={`Page ${view.page + 1} of ${view.pageCount}`} right={LIST_KEYS} />}>
      <OptionList items={view.visible} selected={view.selected} />
    </Scene>
  );
}

// ==========================
// End of Version 2 — src/pages/ListPage.tsx
// ==========================
