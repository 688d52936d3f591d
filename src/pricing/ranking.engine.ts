import _ from 'lodash';
import { TimeSlot } from '../common/utils/time-slot.util';
import { DerivedPriceSet, PriceRanking, RankedSlots, RankingOptions } from './models/pricing.model';

/**
 * Classifies the slots of a day into cheapest and most expensive sets
 *
 * - cheapest / mostExpensive: first N slots from either end of the sorted total
 * - cheapestByAverage: slots priced below sum(first averageWindow sorted) / averageWindow * averageThreshold
 * - mostExpensiveByAverage: every other slot
 */
export function rankPriceSet(priceSet: DerivedPriceSet, options: RankingOptions): PriceRanking {
  const sorted = priceSet.totalSorted.entries;
  const allSlots = sorted.map(entry => entry.slot);

  const cheapest = _.take(allSlots, Math.max(0, options.cheapestCount));
  const mostExpensive = _.take([...allSlots].reverse(), Math.max(0, options.mostExpensiveCount));

  const window = _.take(sorted, Math.max(0, options.averageWindow));
  const average = options.averageWindow > 0 ? _.sumBy(window, entry => entry.value) / options.averageWindow : 0;
  const limit = average * options.averageThreshold;

  const cheapestByAverage = sorted.filter(entry => entry.value < limit).map(entry => entry.slot);
  const mostExpensiveByAverage = _.difference(allSlots, cheapestByAverage);

  return {
    cheapest: toRankedSlots(cheapest, priceSet),
    mostExpensive: toRankedSlots(mostExpensive, priceSet),
    cheapestByAverage: toRankedSlots(cheapestByAverage, priceSet),
    mostExpensiveByAverage: toRankedSlots(mostExpensiveByAverage, priceSet)
  };
}

function toRankedSlots(slots: TimeSlot[], priceSet: DerivedPriceSet): RankedSlots {
  return {
    slots,
    isMember: priceSet.isToday ? slots.includes(priceSet.evaluationSlot) : null
  };
}
