/**
 * Wires the session loop to the real terminal: Ink renders the picker to
 * stderr while keys come from raw stdin.
 */
import { render, type Instance } from 'ink';
import { PickerView } from '../picker/components/picker-view.tsx';
import { runPickerSession, type SessionOutcome } from '../picker/session.ts';
import type { SelectionModel } from '../picker/selection.ts';
import { StdinKeyReader } from '../terminal/key-reader.ts';
import { withTerminalScreen } from '../terminal/screen.ts';

function view(model: SelectionModel) {
  // Expanded flags mutate records in place; copies give Ink fresh props.
  const hosts = model.hosts.map((host) => ({ ...host }));
  return <PickerView hosts={hosts} selected={model.selected} />;
}

export function runInteractiveSession(model: SelectionModel): Promise<SessionOutcome> {
  const streams = { input: process.stdin, output: process.stderr };

  return withTerminalScreen(streams, async () => {
    const keys = new StdinKeyReader(process.stdin);
    const surface: { ink: Instance | null } = { ink: null };

    try {
      return await runPickerSession({
        model,
        keys,
        render: (current) => {
          if (surface.ink) {
            surface.ink.rerender(view(current));
          } else {
            surface.ink = render(view(current), {
              stdout: process.stderr,
              exitOnCtrlC: false,
              patchConsole: false,
            });
          }
        },
      });
    } finally {
      keys.close();
      surface.ink?.unmount();
    }
  });
}
