import type {ReconcileLogContext} from '../@log/index.js';
import {
  Logs,
  RECONCILE_ERROR_PERMANENT,
  RECONCILE_ERROR_TRANSIENT,
  RECONCILE_PUBLIC_IP,
  RECONCILE_RECORD_ABSENT,
  RECONCILE_UNCHANGED,
  RECONCILE_UPDATED,
  RECONCILE_UPDATING,
} from '../@log/index.js';
import {getErrorMessage} from '../@utils/index.js';
import type {AddressFamily} from '../address.js';
import {getDDNSType} from '../address.js';
import {DDNSError, RecordAbsentError} from '../errors.js';
import type {IIPResolver} from '../ip/index.js';

import type {IDDNSProvider} from './ddns-provider.js';

export type UpdateOutcome =
  | {
      type: 'unchanged';
      family: AddressFamily;
      address: string;
    }
  | {
      type: 'updated';
      family: AddressFamily;
      from: string;
      to: string;
    }
  | {
      type: 'failed';
      family: AddressFamily;
      error: DDNSError;
    };

export type ReconcilerOptions = {
  domain: string;
  families: AddressFamily[];
};

export class Reconciler {
  readonly domain: string;

  readonly families: AddressFamily[];

  constructor(
    readonly resolver: IIPResolver,
    readonly provider: IDDNSProvider,
    {domain, families}: ReconcilerOptions,
  ) {
    this.domain = domain;
    this.families = families;
  }

  /**
   * Runs one pass. Families are reconciled concurrently and independently,
   * the returned promise never rejects.
   */
  reconcile(): Promise<UpdateOutcome[]> {
    return Promise.all(
      this.families.map(family => this.reconcileFamily(family)),
    );
  }

  private async reconcileFamily(family: AddressFamily): Promise<UpdateOutcome> {
    const context: ReconcileLogContext = {
      type: 'reconcile',
      family,
      domain: this.domain,
    };

    try {
      return await this._reconcileFamily(family, context);
    } catch (error) {
      const ddnsError =
        error instanceof DDNSError
          ? error
          : new DDNSError(getErrorMessage(error), 'transient', {cause: error});

      if (ddnsError instanceof RecordAbsentError) {
        Logs.error(
          context,
          RECONCILE_RECORD_ABSENT(ddnsError.domain, ddnsError.type),
        );
      } else if (ddnsError.severity === 'permanent') {
        Logs.error(context, RECONCILE_ERROR_PERMANENT(ddnsError));
      } else {
        Logs.warn(context, RECONCILE_ERROR_TRANSIENT(ddnsError));
      }

      Logs.debug(context, error);

      return {type: 'failed', family, error: ddnsError};
    }
  }

  private async _reconcileFamily(
    family: AddressFamily,
    context: ReconcileLogContext,
  ): Promise<UpdateOutcome> {
    const provider = this.provider;
    const domain = this.domain;
    const type = getDDNSType(family);

    const address = await this.resolver.resolve(family);

    Logs.debug(context, RECONCILE_PUBLIC_IP(address));

    const snapshot = await provider.fetch(domain, type);

    if (snapshot.type === 'absent') {
      throw new RecordAbsentError(domain, type);
    }

    if (snapshot.address === address) {
      Logs.debug(context, RECONCILE_UNCHANGED(address));

      return {type: 'unchanged', family, address};
    }

    Logs.info(
      context,
      RECONCILE_UPDATING(snapshot.address, address, provider.name),
    );

    await provider.apply(domain, type, address, snapshot.address);

    Logs.info(context, RECONCILE_UPDATED(snapshot.address, address));

    return {type: 'updated', family, from: snapshot.address, to: address};
  }
}
