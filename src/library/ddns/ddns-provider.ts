import type {DDNSType} from '../address.js';

export type RecordSnapshot =
  | {
      type: 'present';
      /**
       * Canonical address.
       */
      address: string;
    }
  | {
      type: 'absent';
    };

export interface IDDNSProvider {
  readonly name: string;

  /**
   * Checks credentials and resolves anything needed before the first pass.
   */
  initialize(): Promise<void>;

  /**
   * Reads the current value of the record, never modifies it.
   */
  fetch(domain: string, type: DDNSType): Promise<RecordSnapshot>;

  /**
   * Replaces the value of an existing record with `address`. `previous` is
   * the value observed by the preceding `fetch`.
   */
  apply(
    domain: string,
    type: DDNSType,
    address: string,
    previous: string,
  ): Promise<void>;
}
