import {
  CloudflareDDNSOptions,
  CloudflareDDNSProvider,
  DDNSError,
  ProviderError,
  RecordAbsentError,
} from '../library/index.js';

const {constructed, zonesBrowse, dnsRecordsBrowse, dnsRecordsEdit} =
  vi.hoisted(() => ({
    constructed: vi.fn(),
    zonesBrowse: vi.fn(),
    dnsRecordsBrowse: vi.fn(),
    dnsRecordsEdit: vi.fn(),
  }));

vi.mock('cloudflare', () => ({
  default: class {
    zones = {browse: zonesBrowse};

    dnsRecords = {browse: dnsRecordsBrowse, edit: dnsRecordsEdit};

    constructor(options: unknown) {
      constructed(options);
    }
  },
}));

const ZONES = {
  result: [
    {id: 'zone-1', name: 'example.org'},
    {id: 'zone-2', name: 'Example.com'},
  ],
};

const RECORDS = {
  result: [
    {
      id: 'record-1',
      type: 'AAAA',
      name: 'home.example.com',
      content: '2001:DB8:0::1',
      ttl: 1,
      proxied: false,
    },
    {
      id: 'record-2',
      type: 'A',
      name: 'home.example.com',
      content: '192.0.2.1',
      ttl: 300,
      proxied: true,
    },
    {
      id: 'record-3',
      type: 'A',
      name: 'home.example.com',
      content: '192.0.2.2',
      ttl: 300,
      proxied: false,
    },
  ],
};

type BrowseQuery = {
  name?: string;
  type?: string;
  page?: number;
  per_page?: number;
};

/**
 * Serves `items` the way the API pages them, 20 per page unless asked
 * otherwise.
 */
function paginate<T>(
  items: T[],
  {page = 1, per_page = 20}: BrowseQuery,
): {
  result: T[];
  result_info: {page: number; per_page: number; total_pages: number};
} {
  return {
    result: items.slice((page - 1) * per_page, page * per_page),
    result_info: {
      page,
      per_page,
      total_pages: Math.max(Math.ceil(items.length / per_page), 1),
    },
  };
}

function createProvider(timeout?: number): CloudflareDDNSProvider {
  return new CloudflareDDNSProvider(
    'example.com.',
    CloudflareDDNSOptions.satisfies({
      token: 'test-token',
      ...(timeout === undefined ? {} : {timeout}),
    }),
  );
}

vi.spyOn(console, 'info').mockImplementation(() => {});

beforeEach(() => {
  zonesBrowse.mockReset().mockResolvedValue(ZONES);
  dnsRecordsBrowse.mockReset().mockResolvedValue(RECORDS);
  dnsRecordsEdit.mockReset().mockResolvedValue({result: {}});
  constructed.mockClear();
});

test('resolves the zone id once', async () => {
  const provider = createProvider();

  expect(constructed).toHaveBeenCalledWith({token: 'test-token'});

  await provider.initialize();
  await provider.fetch('home.example.com', 'A');
  await provider.fetch('home.example.com', 'AAAA');

  expect(zonesBrowse).toHaveBeenCalledTimes(1);
  expect(zonesBrowse).toHaveBeenCalledWith({
    name: 'example.com',
    page: 1,
    per_page: 50,
  });
  expect(dnsRecordsBrowse).toHaveBeenCalledTimes(2);
  expect(dnsRecordsBrowse).toHaveBeenNthCalledWith(1, 'zone-2', {
    name: 'home.example.com',
    type: 'A',
    page: 1,
    per_page: 100,
  });
  expect(dnsRecordsBrowse).toHaveBeenNthCalledWith(2, 'zone-2', {
    name: 'home.example.com',
    type: 'AAAA',
    page: 1,
    per_page: 100,
  });
});

test('fetches the first matching record', async () => {
  const provider = createProvider();

  await expect(provider.fetch('home.example.com', 'A')).resolves.toEqual({
    type: 'present',
    address: '192.0.2.1',
  });

  await expect(provider.fetch('HOME.example.com.', 'AAAA')).resolves.toEqual(
    {
      type: 'present',
      address: '2001:db8::1',
    },
  );

  await expect(provider.fetch('nas.example.com', 'A')).resolves.toEqual({
    type: 'absent',
  });

  expect(dnsRecordsEdit).not.toHaveBeenCalled();
});

test('edits the existing record keeping its ttl and proxy status', async () => {
  const provider = createProvider();

  await provider.apply('home.example.com', 'A', '192.0.2.9', '192.0.2.1');

  expect(dnsRecordsEdit).toHaveBeenCalledTimes(1);
  expect(dnsRecordsEdit).toHaveBeenCalledWith('zone-2', 'record-2', {
    type: 'A',
    name: 'home.example.com',
    content: '192.0.2.9',
    ttl: 300,
    proxied: true,
  });
});

test('never creates records', async () => {
  const provider = createProvider();

  await expect(
    provider.apply('nas.example.com', 'A', '192.0.2.9', '192.0.2.1'),
  ).rejects.toThrow(new RecordAbsentError('nas.example.com', 'A'));

  expect(dnsRecordsEdit).not.toHaveBeenCalled();
});

test('reports a missing zone as permanent and looks it up again', async () => {
  zonesBrowse.mockResolvedValue({
    result: [{id: 'zone-1', name: 'example.org'}],
  });

  const provider = createProvider();

  const promise = provider.initialize();

  await expect(promise).rejects.toThrow(
    new ProviderError(
      'Zone "example.com." not found or not accessible with this token.',
      'permanent',
    ),
  );
  await expect(promise).rejects.toMatchObject({severity: 'permanent'});

  zonesBrowse.mockResolvedValue(ZONES);

  await provider.initialize();

  expect(zonesBrowse).toHaveBeenCalledTimes(2);
});

test('classifies http errors', async () => {
  zonesBrowse.mockRejectedValueOnce(
    Object.assign(new Error('Forbidden'), {statusCode: 403}),
  );

  const forbidden = createProvider().initialize();

  await expect(forbidden).rejects.toThrow(
    'Cloudflare failed to browse zones (HTTP 403): Forbidden',
  );
  await expect(forbidden).rejects.toMatchObject({severity: 'permanent'});

  zonesBrowse.mockRejectedValueOnce(
    Object.assign(new Error('Service Unavailable'), {
      response: {statusCode: 503},
    }),
  );

  const unavailable = createProvider().initialize();

  await expect(unavailable).rejects.toThrow(
    'Cloudflare failed to browse zones (HTTP 503): Service Unavailable',
  );
  await expect(unavailable).rejects.toMatchObject({severity: 'transient'});

  zonesBrowse.mockRejectedValueOnce(new Error('socket hang up'));

  const disconnected = createProvider().initialize();

  await expect(disconnected).rejects.toThrow(
    'Cloudflare failed to browse zones: socket hang up',
  );
  await expect(disconnected).rejects.toMatchObject({severity: 'transient'});
});

test('treats timeouts and malformed responses as transient', async () => {
  zonesBrowse.mockReturnValueOnce(new Promise(() => {}));

  const timedOut = createProvider(50).initialize();

  await expect(timedOut).rejects.toThrow(
    'Cloudflare failed to browse zones: Cloudflare did not answer within 50ms.',
  );
  await expect(timedOut).rejects.toBeInstanceOf(DDNSError);
  await expect(timedOut).rejects.toMatchObject({severity: 'transient'});

  dnsRecordsBrowse.mockResolvedValueOnce({result: 'nope'});

  const malformed = createProvider().fetch('home.example.com', 'A');

  await expect(malformed).rejects.toThrow(
    /^Unexpected Cloudflare API response: /,
  );
  await expect(malformed).rejects.toMatchObject({severity: 'transient'});
});

test('pages through zones and records', async () => {
  const zones = Array.from({length: 120}, (_, index) => ({
    id: `zone-${index}`,
    name: index === 110 ? 'example.com' : `zone${index}.example`,
  }));

  const records = Array.from({length: 250}, (_, index) => ({
    id: `record-${index}`,
    type: 'A',
    name: index === 240 ? 'home.example.com' : `host${index}.example.com`,
    content: `192.0.2.${index % 250}`,
    ttl: 300,
    proxied: false,
  }));

  // Ignores the name filter so the match is only found on a later page.
  zonesBrowse.mockImplementation((query: BrowseQuery) =>
    Promise.resolve(paginate(zones, query)),
  );
  dnsRecordsBrowse.mockImplementation((_zoneId: string, query: BrowseQuery) =>
    Promise.resolve(paginate(records, query)),
  );

  const provider = createProvider();

  await expect(provider.fetch('home.example.com', 'A')).resolves.toEqual({
    type: 'present',
    address: '192.0.2.240',
  });

  expect(zonesBrowse).toHaveBeenCalledTimes(3);
  expect(zonesBrowse).toHaveBeenLastCalledWith({
    name: 'example.com',
    page: 3,
    per_page: 50,
  });
  expect(dnsRecordsBrowse).toHaveBeenCalledTimes(3);
  expect(dnsRecordsBrowse).toHaveBeenLastCalledWith('zone-110', {
    name: 'home.example.com',
    type: 'A',
    page: 3,
    per_page: 100,
  });

  await provider.apply('home.example.com', 'A', '192.0.2.9', '192.0.2.240');

  expect(dnsRecordsEdit).toHaveBeenCalledWith('zone-110', 'record-240', {
    type: 'A',
    name: 'home.example.com',
    content: '192.0.2.9',
    ttl: 300,
    proxied: false,
  });
});

test('stops after the last page', async () => {
  const records = Array.from({length: 130}, (_, index) => ({
    id: `record-${index}`,
    type: 'A',
    name: `host${index}.example.com`,
    content: '192.0.2.1',
  }));

  dnsRecordsBrowse.mockImplementation((_zoneId: string, query: BrowseQuery) =>
    Promise.resolve(paginate(records, query)),
  );

  const provider = createProvider();

  await expect(provider.fetch('home.example.com', 'A')).resolves.toEqual({
    type: 'absent',
  });

  expect(dnsRecordsBrowse).toHaveBeenCalledTimes(2);
});

test('finds the zone through the name filter', async () => {
  const zones = Array.from({length: 25}, (_, index) => ({
    id: `zone-${index}`,
    name: `zone${index}.example`,
  }));

  zonesBrowse.mockImplementation((query: BrowseQuery) =>
    Promise.resolve(
      paginate(
        zones.filter(
          zone => query.name === undefined || zone.name === query.name,
        ),
        query,
      ),
    ),
  );

  const provider = new CloudflareDDNSProvider(
    'zone24.example',
    CloudflareDDNSOptions.satisfies({token: 'test-token'}),
  );

  await provider.initialize();

  expect(zonesBrowse).toHaveBeenCalledTimes(1);
  expect(zonesBrowse).toHaveBeenCalledWith({
    name: 'zone24.example',
    page: 1,
    per_page: 50,
  });
});
