/**
 * Rendering tests for the host picker view.
 */
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { PickerView } from '../../src/picker/components/picker-view.tsx';
import { FOOTER_HELP } from '../../src/picker/components/footer.tsx';
import { createHostRecord, type HostRecord } from '../../src/ssh-config/host.ts';

function frameLines(hosts: HostRecord[], selected: number | null): string[] {
  const { lastFrame, unmount } = render(<PickerView hosts={hosts} selected={selected} />);
  const frame = (lastFrame() ?? '').replace(/\x1b\[[0-9;]*m/g, '');
  unmount();
  return frame.split('\n');
}

function lineWith(lines: string[], text: string): string {
  const line = lines.find((l) => l.includes(text));
  if (line === undefined) {
    throw new Error(`no line contains ${JSON.stringify(text)}`);
  }
  return line;
}

describe('PickerView', () => {
  const hosts = () => [
    createHostRecord('alpha', { hostName: '10.0.0.1', port: 2222 }),
    createHostRecord('beta', { user: 'root', identityFile: '~/.ssh/beta' }),
  ];

  it('shows the title with the host count and the key help', () => {
    const lines = frameLines(hosts(), null);
    expect(lineWith(lines, 'Your ssh configs')).toContain('Your ssh configs (2)');
    expect(lines.some((l) => l.includes(FOOTER_HELP))).toBe(true);
  });

  it('renders a collapsed row with the present summary fields', () => {
    const lines = frameLines(hosts(), null);
    const alpha = lineWith(lines, 'alpha');
    expect(alpha).toContain('10.0.0.1');
    expect(alpha).toContain('2222');
    const beta = lineWith(lines, 'beta');
    expect(beta).toContain('root');
    expect(beta).not.toContain('~/.ssh/beta');
  });

  it('marks the selected row', () => {
    const lines = frameLines(hosts(), 1);
    expect(lineWith(lines, 'beta').trimStart().startsWith('> beta')).toBe(true);
    expect(lineWith(lines, 'alpha')).not.toContain('>');
  });

  it('lists only present attributes on an expanded row', () => {
    const list = hosts();
    list[0].expanded = true;
    const raw = frameLines(list, 0);
    expect(lineWith(raw, 'HostName').trimEnd()).toBe('  HostName 10.0.0.1');
    const lines = raw.map((l) => l.trim());
    expect(lines).toContain('> alpha');
    expect(lines).toContain('HostName 10.0.0.1');
    expect(lines).toContain('Port 2222');
    expect(lines.some((l) => l.startsWith('User'))).toBe(false);
    expect(lines.some((l) => l.includes('none'))).toBe(false);
  });

  it('renders duplicate identifiers as separate rows', () => {
    const lines = frameLines([createHostRecord('dup'), createHostRecord('dup')], null);
    expect(lines.filter((l) => l.trim() === 'dup')).toHaveLength(2);
  });

  it('says so when there are no hosts', () => {
    const lines = frameLines([], null);
    expect(lineWith(lines, 'Your ssh configs')).toContain('(0)');
    expect(lines.map((l) => l.trim())).toContain('No hosts found.');
  });
});
