// ==========================
// Version 1 — src/pages/MenuPage.tsx
// - Fixed option menus (home, habit, record, confirm)
// ==========================
import OptionList from "../components/OptionList";
import Scene from "../components/Scene";

export type MenuPageProps = {
  title: string;
  lines?: string[];
  options: string[];
  selected: number;
};

export default function MenuPage({ title, lines, options, selected }: MenuPageProps) {
  return (
    <Scene title={title} lines={lines}>
      <OptionList items={options} selected={selected} />
    </Scene>
  );
}

// ==========================
// End of Version 1 — src/pages/MenuPage.tsx
// ==========================
