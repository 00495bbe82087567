// ==========================
// Version 1 — src/terminal/inkUi.ts
// - One Ink instance for the whole session; each frame re-renders it
// - Ink never reads stdin here (no useInput), the KeyReader owns input
// ==========================
import type { ReactElement } from "react";
import { render, type Instance } from "ink";

export type Ui = {
  show: (view: ReactElement) => void;
  close: () => void;
};

export function createInkUi(stdout: NodeJS.WriteStream = process.stdout): Ui {
  let instance: Instance | null = null;

  return {
    show(view) {
      if (instance) {
        instance.rerender(view);
        return;
      }
      instance = render(view, { stdout, exitOnCtrlC: false, patchConsole: true });
    },
    close() {
      if (!instance) return;
      instance.unmount();
      instance = null;
    },
  };
}

// ==========================
// End of Version 1 — src/terminal/inkUi.ts
// ==========================
