import { silentLogger } from '../../../../src/lib/logger';
import { EbayFindingSource } from '../../../../src/lib/pricing/sources/ebay-finding';
import type { SoldListingQuery } from '../../../../src/lib/pricing/types';

const QUERY: SoldListingQuery = {
  keywords: 'Nike Air Force 1 Low 10',
  brand: 'Nike',
  model: 'Air Force 1 Low',
  size: '10',
  conditionGrade: 'good',
};

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body,
    text: async () => JSON.stringify(body),
  } as unknown as Response;
}

function textResponse(text: string, status: number, statusText: string): Response {
  return {
    ok: false,
    status,
    statusText,
    json: async () => ({}),
    text: async () => text,
  } as unknown as Response;
}

function envelope(items: unknown[], ack = 'Success') {
  return { findCompletedItemsResponse: [{ ack: [ack], searchResult: [{ item: items }] }] };
}

describe('EbayFindingSource', () => {
  let fetchSpy: jest.SpyInstance;
  const signal = new AbortController().signal;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds a sold-only US search filtered to the condition group', () => {
    const source = new EbayFindingSource({ appId: 'test-app', sandbox: false, logger: silentLogger });
    const url = source.buildUrl(QUERY);

    expect(url.origin).toBe('https://svcs.ebay.com');
    expect(url.searchParams.get('OPERATION-NAME')).toBe('findCompletedItems');
    expect(url.searchParams.get('SECURITY-APPNAME')).toBe('test-app');
    expect(url.searchParams.get('keywords')).toBe('Nike Air Force 1 Low 10');
    expect(url.searchParams.get('itemFilter(0).name')).toBe('SoldItemsOnly');
    expect(url.searchParams.get('itemFilter(1).value')).toBe('US');
    expect(url.searchParams.get('itemFilter(2).name')).toBe('Condition');
    expect(url.searchParams.get('itemFilter(2).value(0)')).toBe('2000');
    expect(url.searchParams.get('itemFilter(2).value(5)')).toBe('6000');
  });

  it('uses the sandbox host and new-item condition ids', () => {
    const source = new EbayFindingSource({ appId: 'test-app', sandbox: true, logger: silentLogger });
    const url = source.buildUrl({ ...QUERY, conditionGrade: 'new-with-tags' });

    expect(url.origin).toBe('https://svcs.sandbox.ebay.com');
    expect(url.searchParams.get('itemFilter(2).value(0)')).toBe('1000');
    expect(url.searchParams.get('itemFilter(2).value(2)')).toBe('1750');
    expect(url.searchParams.get('itemFilter(2).value(3)')).toBeNull();
  });

  it('parses sold items and skips unsold or priceless ones', async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse(
        envelope([
          {
            title: ['Nike AF1 Low 10'],
            sellingStatus: [{ currentPrice: [{ __value__: '89.99' }], sellingState: ['EndedWithSales'] }],
            condition: [{ conditionDisplayName: ['Pre-owned'] }],
            listingInfo: [{ endTime: ['2026-03-10T18:00:00.000Z'], listingType: ['FixedPrice'] }],
          },
          {
            title: ['Nike AF1 auction'],
            sellingStatus: [{ currentPrice: [{ __value__: '61.00' }], sellingState: ['EndedWithSales'] }],
            listingInfo: [{ endTime: ['2026-03-09T18:00:00.000Z'], listingType: ['Auction'], watchCount: ['7'] }],
            shippingInfo: [{ shippingServiceCost: [{ __value__: '5.50' }] }],
          },
          {
            title: ['Unsold AF1'],
            sellingStatus: [{ currentPrice: [{ __value__: '70.00' }], sellingState: ['EndedWithoutSales'] }],
            listingInfo: [{ endTime: ['2026-03-08T18:00:00.000Z'] }],
          },
          {
            title: ['No price'],
            listingInfo: [{ endTime: ['2026-03-08T18:00:00.000Z'] }],
          },
        ])
      )
    );
    const source = new EbayFindingSource({ appId: 'test-app', sandbox: false, logger: silentLogger });

    const listings = await source.search(QUERY, signal);

    expect(listings).toEqual([
      {
        title: 'Nike AF1 Low 10',
        price: 89.99,
        conditionLabel: 'Pre-owned',
        soldDate: new Date('2026-03-10T18:00:00.000Z'),
        isAuction: false,
        source: 'ebay-finding',
      },
      {
        title: 'Nike AF1 auction',
        price: 61,
        conditionLabel: '',
        soldDate: new Date('2026-03-09T18:00:00.000Z'),
        isAuction: true,
        source: 'ebay-finding',
        watcherCount: 7,
        shippingCost: 5.5,
      },
    ]);
    expect(fetchSpy).toHaveBeenCalledWith(expect.stringContaining('findCompletedItems'), {
      headers: { Accept: 'application/json' },
      signal,
    });
  });

  it('refuses to search without an app id', async () => {
    const source = new EbayFindingSource({ appId: '', logger: silentLogger });
    expect(source.isConfigured()).toBe(false);
    await expect(source.search(QUERY, signal)).rejects.toThrow('EBAY_APP_ID is not configured');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('recognises the rate limit error', async () => {
    fetchSpy.mockResolvedValue(
      textResponse('You have exceeded the number of times the operation can be called', 500, 'Internal Server Error')
    );
    const source = new EbayFindingSource({ appId: 'test-app', logger: silentLogger });
    await expect(source.search(QUERY, signal)).rejects.toThrow('eBay Finding API rate limit exceeded');
  });

  it('rejects on other HTTP errors', async () => {
    fetchSpy.mockResolvedValue(textResponse('down', 503, 'Service Unavailable'));
    const source = new EbayFindingSource({ appId: 'test-app', logger: silentLogger });
    await expect(source.search(QUERY, signal)).rejects.toThrow('eBay Finding API error: 503 Service Unavailable');
  });

  it('rejects a Failure ack and a malformed payload', async () => {
    const source = new EbayFindingSource({ appId: 'test-app', logger: silentLogger });

    fetchSpy.mockResolvedValueOnce(jsonResponse(envelope([], 'Failure')));
    await expect(source.search(QUERY, signal)).rejects.toThrow('eBay Finding API returned Failure');

    fetchSpy.mockResolvedValueOnce(jsonResponse({ unexpected: true }));
    await expect(source.search(QUERY, signal)).rejects.toThrow('Malformed eBay Finding API response');
  });
});
