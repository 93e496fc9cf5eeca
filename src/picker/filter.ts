import type { HostRecord } from '../ssh-config/host.ts';

/**
 * Keep hosts whose identifier, hostname or user contains `query`,
 * ignoring case. Order is preserved; an empty query keeps everything.
 */
export function filterHosts(hosts: readonly HostRecord[], query: string): HostRecord[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [...hosts];

  return hosts.filter((host) =>
    [host.hostId, host.hostName, host.user].some((field) => field?.toLowerCase().includes(needle)),
  );
}
