import Activation from '../../src/methods/activation';

describe('Activation', () => {
  const epsilon = 12; // decimal digits for toBeCloseTo

  describe('logistic()', () => {
    describe('Scenario: x = 0', () => {
      it('returns exactly 0.5', () => {
        // Arrange
        const x = 0;
        // Act
        const result = Activation.logistic(x);
        // Assert
        expect(result).toBe(0.5);
      });
    });

    describe('Scenario: lower clamp', () => {
      [-15, -15.0001, -30, -1e6, -Infinity].forEach((x) => {
        it(`returns exactly 0 for x=${x}`, () => {
          // Act
          const result = Activation.logistic(x);
          // Assert
          expect(result).toBe(0);
        });
      });
    });

    describe('Scenario: upper clamp', () => {
      [15, 15.0001, 30, 1e6, Infinity].forEach((x) => {
        it(`returns exactly 1 for x=${x}`, () => {
          // Act
          const result = Activation.logistic(x);
          // Assert
          expect(result).toBe(1);
        });
      });
    });

    describe('Scenario: inside the clamp window', () => {
      [-14.999, -1, -0.5, 0.5, 1, 6, 14.999].forEach((x) => {
        it(`matches 1 / (1 + e^-x) for x=${x}`, () => {
          // Arrange
          const expected = 1 / (1 + Math.exp(-x));
          // Act
          const result = Activation.logistic(x);
          // Assert
          expect(result).toBeCloseTo(expected, epsilon);
        });
      });
      it('stays strictly between 0 and 1 just inside the thresholds', () => {
        // Act
        const low = Activation.logistic(-14.999);
        const high = Activation.logistic(14.999);
        // Assert
        expect([low > 0, high < 1]).toEqual([true, true]);
      });
      it('is symmetric around 0.5', () => {
        // Act
        const sum = Activation.logistic(2.5) + Activation.logistic(-2.5);
        // Assert
        expect(sum).toBeCloseTo(1, epsilon);
      });
    });
  });
});
