import { ulid } from "ulid";

export type InstallRecordId = `ins_${string}`;

export function newInstallRecordId(): InstallRecordId {
  return `ins_${ulid()}` as const;
}

export function isInstallRecordId(value: string): value is InstallRecordId {
  return /^ins_[0-9A-HJKMNP-TV-Z]{26}$/.test(value);
}
