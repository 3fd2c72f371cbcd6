import { FarePredictor } from './farePredictor.client';
import { FareService, fareBracketFor, fareForPassengers, localFareEstimate } from './fare.service';

describe('fare estimation', () => {
  describe('localFareEstimate', () => {
    it('applies the default distance and traffic level', () => {
      // (20 * 1 + 5 * 5) * 1.1
      expect(localFareEstimate({ passengerCount: 1 })).toBe(49.5);
      expect(localFareEstimate({ passengerCount: 2 })).toBe(71.5);
    });

    it('uses explicit distance and traffic', () => {
      // (20 * 3 + 10 * 5) * 1.2
      expect(localFareEstimate({ passengerCount: 3, distanceKm: 10, trafficLevel: 2 })).toBe(132);
    });

    it('never goes below the minimum fare', () => {
      expect(localFareEstimate({ passengerCount: 0, distanceKm: 0, trafficLevel: 0 })).toBe(5);
    });
  });

  describe('fareBracketFor', () => {
    it('classifies passengers by age', () => {
      expect(fareBracketFor(0)).toBeNull();
      expect(fareBracketFor(1)).toBe('child');
      expect(fareBracketFor(12)).toBe('child');
      expect(fareBracketFor(13)).toBe('adult');
      expect(fareBracketFor('teacher')).toBe('teacher');
    });
  });

  describe('fareForPassengers', () => {
    it('sums the fare table over passenger ages', () => {
      expect(fareForPassengers({ adult: 150, child: 75 }, [10, 30, 5])).toBe(300);
    });

    it('charges adult price for missing brackets and nothing for infants', () => {
      expect(fareForPassengers({ adult: 150 }, [10, 'teacher', 0])).toBe(300);
      expect(fareForPassengers({ adult: 150, teacher: 120 }, ['teacher', 40])).toBe(270);
    });
  });

  describe('FareService.estimate', () => {
    it('uses the local formula without a predictor', async () => {
      await expect(new FareService().estimate({ passengerCount: 1 })).resolves.toBe(49.5);
    });

    it('returns the predictor fare rounded to two decimals', async () => {
      const predictor: FarePredictor = { predict: jest.fn().mockResolvedValue(88.456) };
      await expect(new FareService(predictor).estimate({ passengerCount: 1 })).resolves.toBe(88.46);
    });

    it('falls back when the predictor rejects', async () => {
      const predictor: FarePredictor = { predict: jest.fn().mockRejectedValue(new Error('connection refused')) };
      await expect(new FareService(predictor).estimate({ passengerCount: 2 })).resolves.toBe(71.5);
    });

    it('falls back on a negative or non-finite fare', async () => {
      const negative: FarePredictor = { predict: jest.fn().mockResolvedValue(-10) };
      const notANumber: FarePredictor = { predict: jest.fn().mockResolvedValue(Number.NaN) };
      await expect(new FareService(negative).estimate({ passengerCount: 1 })).resolves.toBe(49.5);
      await expect(new FareService(notANumber).estimate({ passengerCount: 1 })).resolves.toBe(49.5);
    });

    it('falls back when the predictor exceeds the timeout', async () => {
      const slow: FarePredictor = {
        predict: () => new Promise<number>((resolve) => setTimeout(() => resolve(999), 200)),
      };
      await expect(new FareService(slow, 20).estimate({ passengerCount: 1 })).resolves.toBe(49.5);
    });
  });
});
