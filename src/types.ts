export interface Approval {
  readonly labelType: string;
  readonly value: number;
  readonly byName?: string;
  readonly byEmail?: string;
}

export interface Review {
  readonly number: number;
  readonly subject: string;
  readonly branch: string;
  readonly project: string;
  readonly status: string;
  readonly ownerName: string;
  readonly ownerEmail?: string;
  // current patchset
  readonly patchsetNumber: number;
  readonly revision: string;
  readonly ref: string;
  readonly lastUpdated: number;
  readonly sizeInsertions: number;
  readonly sizeDeletions: number;
  readonly isDraft: boolean;
  readonly approvals: readonly Approval[];
  readonly url: string;
  readonly id: string;
}

export interface Label {
  readonly name: string;
  readonly short: string;
  readonly approved: number;
  readonly rejected: number;
}

export type LabelSet = readonly Label[];

export interface ConnectionConfig {
  readonly hostAndUser?: string;
  readonly port: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Runs a binary with an argument vector. Rejects only when the process cannot start. */
export type CommandRunner = (file: string, args: readonly string[]) => Promise<CommandResult>;
