import { silentLogger } from '../../../src/lib/logger';
import { HttpBarcodeLookup, normalizeBarcode } from '../../../src/lib/providers/barcode-lookup';

function jsonResponse(body: unknown, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  } as unknown as Response;
}

describe('barcode-lookup', () => {
  let fetchSpy: jest.SpyInstance;
  const lookup = new HttpBarcodeLookup({ timeoutMs: 1000, logger: silentLogger });

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('normalizes UPC/EAN codes', () => {
    expect(normalizeBarcode('0 885909-950805')).toBe('0885909950805');
    expect(normalizeBarcode('1234567')).toBeNull();
    expect(normalizeBarcode('ABC12345')).toBeNull();
  });

  it('returns the UPCitemdb record', async () => {
    fetchSpy.mockResolvedValue(
      jsonResponse({ code: 'OK', items: [{ title: ' Apple AirPods Pro ', brand: 'Apple', category: 'Electronics > Audio' }] })
    );

    expect(await lookup.lookup('0885909950805')).toEqual({
      upc: '0885909950805',
      title: 'Apple AirPods Pro',
      brand: 'Apple',
      category: 'Electronics > Audio',
      source: 'upcitemdb',
    });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy.mock.calls[0][0]).toBe('https://api.upcitemdb.com/prod/trial/lookup?upc=0885909950805');
  });

  it('falls through to Open Food Facts', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ code: 'OK', items: [] })).mockResolvedValueOnce(
      jsonResponse({
        status: 1,
        product: { product_name: 'Crunchy Peanut Butter', brands: 'Acme Foods, Acme', categories: 'Spreads, Nut butters' },
      })
    );

    expect(await lookup.lookup('012345678905')).toEqual({
      upc: '012345678905',
      title: 'Crunchy Peanut Butter',
      brand: 'Acme Foods',
      category: 'Spreads',
      source: 'openfoodfacts',
    });
    expect(fetchSpy.mock.calls[1][0]).toBe('https://world.openfoodfacts.org/api/v0/product/012345678905.json');
  });

  it('returns null when neither service knows the code', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({}, 429)).mockResolvedValueOnce(jsonResponse({ status: 0 }));
    expect(await lookup.lookup('012345678905')).toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('ignores malformed codes without a request', async () => {
    expect(await lookup.lookup('not-a-code')).toBeNull();
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
