import {
  SNAPSHOT_PATHS_WIDTH,
  type ResticClient,
  type SelectOption,
  type Selector,
  type Snapshot,
} from './types.js';

/** `<short id>  <date>  <host>  <paths>`, with the path column cut to a fixed width. */
export function formatSnapshotLine(snapshot: Snapshot): string {
  const date = snapshot.time.split('T')[0] ?? snapshot.time;
  const paths = snapshot.paths.join(', ').slice(0, SNAPSHOT_PATHS_WIDTH);
  return `${snapshot.shortId}  ${date}  ${snapshot.hostname}  ${paths}`;
}

export function toSnapshotOptions(snapshots: readonly Snapshot[]): SelectOption<string>[] {
  return snapshots.map((snapshot) => ({
    label: formatSnapshotLine(snapshot),
    value: snapshot.shortId,
  }));
}

/**
 * Lists every snapshot in the repository and lets the user pick one.
 * Resolves to the short id, or null when the user picked nothing.
 * Throws when the repository holds no snapshots.
 */
export async function selectSnapshot(
  client: ResticClient,
  selector: Selector,
): Promise<string | null> {
  console.error('Fetching snapshots...');
  const snapshots = await client.listSnapshots();
  if (snapshots.length === 0) {
    throw new Error('No snapshots found.');
  }
  console.error('Select a snapshot:');
  const id = await selector.selectOne(toSnapshotOptions(snapshots), 'snapshot>');
  return id ?? null;
}
