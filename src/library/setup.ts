import {
  DDNS_PROVIDER_INITIALIZED,
  DDNS_PROVIDER_INITIALIZE_FAILED_TRANSIENT,
  Logs,
} from './@log/index.js';
import type {ResolvedConfig} from './config.js';
import type {IDDNSProvider} from './ddns/index.js';
import {Reconciler, Scheduler, createDDNSProvider} from './ddns/index.js';
import {DDNSError} from './errors.js';
import type {IIPResolver} from './ip/index.js';
import {createIPResolver} from './ip/index.js';

export type SetupOverrides = {
  provider?: IDDNSProvider;
  resolver?: IIPResolver;
};

/**
 * Builds the provider, resolver and reconciler described by `config` and
 * starts the scheduler. Permanent provider errors during initialization are
 * fatal, transient ones are logged and the scheduler starts anyway.
 */
export async function setup(
  {
    zone,
    domain,
    families,
    interval,
    resolver: resolverOptions,
    provider: providerConfig,
  }: ResolvedConfig,
  {
    provider = createDDNSProvider(zone, providerConfig),
    resolver = createIPResolver(resolverOptions),
  }: SetupOverrides = {},
): Promise<Scheduler> {
  try {
    await provider.initialize();

    Logs.info('ddns', DDNS_PROVIDER_INITIALIZED(provider.name, domain));
  } catch (error) {
    if (!(error instanceof DDNSError) || error.severity === 'permanent') {
      throw error;
    }

    Logs.warn(
      'ddns',
      DDNS_PROVIDER_INITIALIZE_FAILED_TRANSIENT(provider.name, error),
    );
  }

  const reconciler = new Reconciler(resolver, provider, {domain, families});

  const scheduler = new Scheduler(() => reconciler.reconcile(), interval);

  scheduler.start();

  return scheduler;
}
