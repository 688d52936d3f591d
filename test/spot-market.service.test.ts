import { Test, TestingModule } from '@nestjs/testing';
import { PriceCacheModule } from '../src/common/cache/price-cache.module';
import { CACHE_TOKENS, PriceCacheType } from '../src/common/cache/price-cache.constants';
import { IPriceCache } from '../src/common/cache/price-cache.interface';
import { PriceErrorKind } from '../src/common/errors/price.errors';
import { MarketModule } from '../src/market/market.module';
import { SpotMarketService } from '../src/market/spot-market.service';
import { cnbFixing, oteChart, stubMarket } from './helpers/market-fixtures';

const DATE = '2026-10-19';

function sequence(length: number): number[] {
  return Array.from({ length }, (_, index) => index);
}

describe('SpotMarketService', () => {
  let moduleRef: TestingModule;
  let service: SpotMarketService;
  let cache: IPriceCache;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [PriceCacheModule.forRoot(PriceCacheType.MEMORY), MarketModule]
    }).compile();

    service = moduleRef.get(SpotMarketService);
    cache = moduleRef.get<IPriceCache>(CACHE_TOKENS.PRICE_CACHE);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  test('requests the chart of the given day', async () => {
    const fetchSpy = stubMarket({ prices: { [DATE]: sequence(24) }, fixing: cnbFixing('25') });

    await service.fetchPrices(DATE);

    const url = new URL(String(fetchSpy.mock.calls[0][0]));
    expect(url.searchParams.get('report_date')).toBe(DATE);
  });

  test('keys 24 points by hour', async () => {
    stubMarket({ prices: { [DATE]: sequence(24).map(hour => hour * 10) }, fixing: cnbFixing('25') });

    const points = await service.fetchPrices(DATE);

    expect(points).toHaveLength(24);
    expect(points[0]).toEqual({ slot: 0, value: 0 });
    expect(points[23]).toEqual({ slot: 23, value: 230 });
  });

  test('lays 96 points out as quarter hours', async () => {
    stubMarket({ prices: { [DATE]: sequence(96) }, fixing: cnbFixing('25') });

    const points = await service.fetchPrices(DATE);

    expect(points).toHaveLength(96);
    expect(points[0]).toEqual({ slot: '0:00', value: 0 });
    expect(points[5]).toEqual({ slot: '1:15', value: 5 });
    expect(points[95]).toEqual({ slot: '23:45', value: 95 });
  });

  test('drops the repeated hour of a 100 point day', async () => {
    stubMarket({ prices: { [DATE]: sequence(100) }, fixing: cnbFixing('25') });

    const points = await service.fetchPrices(DATE);

    expect(points).toHaveLength(96);
    expect(points[7]).toEqual({ slot: '1:45', value: 7 });
    expect(points[8]).toEqual({ slot: '2:00', value: 12 });
    expect(points[95]).toEqual({ slot: '23:45', value: 99 });
  });

  test('fails with price not found when the day has no points', async () => {
    stubMarket({ prices: {}, fixing: cnbFixing('25') });

    await expect(service.fetchPrices(DATE)).rejects.toMatchObject({
      kind: PriceErrorKind.PRICE_NOT_FOUND,
      date: DATE
    });
    expect(await cache.read({ date: DATE, kind: 'prices' })).toBeNull();
  });

  test('serves a complete day from the cache', async () => {
    const fetchSpy = stubMarket({ prices: { [DATE]: sequence(24) }, fixing: cnbFixing('25') });

    const first = await service.fetchPrices(DATE);
    const second = await service.fetchPrices(DATE);

    expect(second).toEqual(first);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  test('serves quarter-hour slots from the cache in slot order', async () => {
    stubMarket({ prices: { [DATE]: sequence(96) }, fixing: cnbFixing('25') });

    await service.fetchPrices(DATE);
    const cached = await service.fetchPrices(DATE);

    expect(cached.slice(0, 3)).toEqual([
      { slot: '0:00', value: 0 },
      { slot: '0:15', value: 1 },
      { slot: '0:30', value: 2 }
    ]);
  });

  test('does not cache a partial day', async () => {
    const fetchSpy = stubMarket({ prices: { [DATE]: sequence(50) }, fixing: cnbFixing('25') });

    const points = await service.fetchPrices(DATE);
    await service.fetchPrices(DATE);

    expect(points).toHaveLength(50);
    expect(points[49].slot).toBe('12:15');
    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(await cache.read({ date: DATE, kind: 'prices' })).toBeNull();
  });

  test('skips the cache lookup with noCache and refreshes the entry', async () => {
    await cache.write({ date: DATE, kind: 'prices' }, JSON.stringify({ '0': 1 }));
    const fetchSpy = stubMarket({ prices: { [DATE]: sequence(24) }, fixing: cnbFixing('25') });

    const points = await service.fetchPrices(DATE, { noCache: true });

    expect(points).toHaveLength(24);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(await service.fetchPrices(DATE)).toHaveLength(24);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  test('refetches when the cached document is unreadable', async () => {
    await cache.write({ date: DATE, kind: 'prices' }, 'not json');
    const fetchSpy = stubMarket({ prices: { [DATE]: sequence(24) }, fixing: cnbFixing('25') });

    const points = await service.fetchPrices(DATE);

    expect(points).toHaveLength(24);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  test('retries a transport failure', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(new Response(JSON.stringify(oteChart(sequence(24))), { status: 200 }));

    const points = await service.fetchPrices(DATE);

    expect(points).toHaveLength(24);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  test('does not retry an HTTP error status', async () => {
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(new Response('unavailable', { status: 500, statusText: 'Internal Server Error' }));

    await expect(service.fetchPrices(DATE)).rejects.toThrow('OTE API error: 500 Internal Server Error');
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  test('rejects a payload without chart data', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response(JSON.stringify({ status: 'ok' }), { status: 200 }));

    await expect(service.fetchPrices(DATE)).rejects.toThrow(`OTE API returned an unexpected payload for ${DATE}`);
  });

  test('rejects a chart with non-numeric hour labels', async () => {
    const point = sequence(24).map(hour => ({ x: hour === 5 ? 'a' : String(hour + 1), y: 10 }));
    const chart = { data: { dataLine: [{ title: 'Cena (EUR/MWh)', point }] } };
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response(JSON.stringify(chart), { status: 200 }));

    await expect(service.fetchPrices(DATE)).rejects.toThrow(`OTE API returned an unexpected payload for ${DATE}`);
  });
});
