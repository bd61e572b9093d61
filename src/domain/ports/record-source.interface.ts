import type { UserRecord } from '../models/user-record.model';

export interface IRecordSource {
  /** Read every record eagerly, in file order. Rejects with SourceReadError. */
  parse(path: string): Promise<UserRecord[]>;
}
