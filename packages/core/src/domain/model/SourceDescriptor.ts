/** Identifies one dataset in a remote dataset repository. */
export interface HubDescriptor {
  readonly kind: 'hub';
  readonly repoId: string;
  readonly config?: string;
  readonly split: string;
}

/** Identifies a file, or a directory tree of files, on a local or remote filesystem. */
export interface FilesystemDescriptor {
  readonly kind: 'filesystem';
  readonly path: string;
  readonly filetype?: string;
  readonly split: string;
}

/** Identifies a previously materialized on-disk snapshot. */
export interface SnapshotDescriptor {
  readonly kind: 'snapshot';
  readonly snapshotPath: string;
  readonly config?: string;
  readonly split?: string;
  readonly isDistiset: boolean;
}

/** Identifies rows held in memory. */
export interface InlineDescriptor {
  readonly kind: 'inline';
  readonly name: string;
}

export type SourceDescriptor = HubDescriptor | FilesystemDescriptor | SnapshotDescriptor | InlineDescriptor;

export type SourceKind = SourceDescriptor['kind'];

/** Human-readable, single-line description of a source, used in error messages and logs. */
export function describeSource(descriptor: SourceDescriptor): string {
  switch (descriptor.kind) {
    case 'hub':
      return `hub:${descriptor.repoId}${descriptor.config ? `/${descriptor.config}` : ''}[${descriptor.split}]`;
    case 'filesystem':
      return `filesystem:${descriptor.path}[${descriptor.split}]`;
    case 'snapshot': {
      const parts = [descriptor.config, descriptor.split].filter((p): p is string => p !== undefined);
      return `snapshot:${descriptor.snapshotPath}${parts.length > 0 ? `[${parts.join('/')}]` : ''}`;
    }
    case 'inline':
      return `inline:${descriptor.name}`;
  }
}
