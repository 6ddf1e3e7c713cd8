import type React from 'react';
import { render } from 'ink';

/** Mount an Ink tree and resolve once the tree calls `useApp().exit()`. */
export async function renderApp(element: React.ReactElement): Promise<void> {
  const instance = render(element, { exitOnCtrlC: true });
  await instance.waitUntilExit();
  instance.cleanup();
}
