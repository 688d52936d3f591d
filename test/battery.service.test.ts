import { Test, TestingModule } from '@nestjs/testing';
import { BatteryModule } from '../src/battery/battery.module';
import { BatteryService } from '../src/battery/battery.service';
import { BatteryPlanOptions } from '../src/battery/models/battery.model';
import { PriceCacheModule } from '../src/common/cache/price-cache.module';
import { PriceCacheType } from '../src/common/cache/price-cache.constants';
import { ClockService } from '../src/common/clock.service';
import { PriceErrorKind } from '../src/common/errors/price.errors';
import { FixedClock, cnbFixing, oteChart, stubMarket } from './helpers/market-fixtures';
import { DAY_PRICES } from './helpers/testing-app';

const TODAY = '2026-10-19';
const TOMORROW = '2026-10-20';

const OPTIONS: BatteryPlanOptions = {
  batteryKwhPrice: 2.5,
  tariff: { kwhFeesLow: 0, kwhFeesHigh: 0, sellFees: 0, vat: 1.21, lowTariffHours: [] }
};

describe('BatteryService', () => {
  let moduleRef: TestingModule;
  let service: BatteryService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [PriceCacheModule.forRoot(PriceCacheType.MEMORY), BatteryModule]
    })
      .overrideProvider(ClockService)
      .useValue(new FixedClock(TODAY, '5:00'))
      .compile();

    service = moduleRef.get(BatteryService);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  test('plans without lookahead when tomorrow is not published', async () => {
    stubMarket({ prices: { [TODAY]: DAY_PRICES }, fixing: cnbFixing('25') });

    const plan = await service.getChargingPlan(OPTIONS);

    expect(plan.isViable).toBe(true);
    expect(plan.chargingSlots).toEqual([2, 3, 4, 5, 13]);
    expect(plan.dischargingSlots).toEqual([8, 9, 16, 17, 18, 19]);
  });

  test('evaluates the current slot of the clock', async () => {
    stubMarket({ prices: { [TODAY]: DAY_PRICES }, fixing: cnbFixing('25') });

    const plan = await service.getChargingPlan(OPTIONS);

    expect(plan.isChargingSlot).toBe(true);
    expect(plan.isDischargingSlot).toBe(false);
  });

  test("fails when today's prices are missing", async () => {
    stubMarket({ prices: { [TOMORROW]: DAY_PRICES }, fixing: cnbFixing('25') });

    await expect(service.getChargingPlan(OPTIONS)).rejects.toMatchObject({
      kind: PriceErrorKind.PRICE_NOT_FOUND,
      date: TODAY
    });
  });

  test('propagates lookahead failures other than missing prices', async () => {
    jest.spyOn(global, 'fetch').mockImplementation(async input => {
      const url = new URL(String(input));
      if (url.searchParams.get('report_date') === TOMORROW) {
        return new Response('down', { status: 503, statusText: 'Service Unavailable' });
      }
      if (url.searchParams.has('report_date')) {
        return new Response(JSON.stringify(oteChart(DAY_PRICES)), { status: 200 });
      }
      return new Response(cnbFixing('25'), { status: 200 });
    });

    await expect(service.getChargingPlan(OPTIONS)).rejects.toThrow('OTE API error: 503 Service Unavailable');
  });
});
