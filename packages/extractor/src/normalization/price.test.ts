import { cleanPrice, parsePriceText, formatPrice } from './price';

describe('cleanPrice', () => {
  describe('Norwegian format', () => {
    it('should normalize "1 990,-"', () => {
      expect(cleanPrice('1 990,-')).toBe(1990);
    });

    it('should normalize "199 kr"', () => {
      expect(cleanPrice('199 kr')).toBe(199);
    });

    it('should normalize "Kr 1\\u00A0299,00" (NBSP, capitalized token)', () => {
      expect(cleanPrice('Kr 1\u00A0299,00')).toBe(1299);
    });

    it('should normalize "12 490,-" with "kr" prefix', () => {
      expect(cleanPrice('kr 12 490,-')).toBe(12490);
    });
  });

  describe('European format', () => {
    it('should normalize "1.990,50"', () => {
      expect(cleanPrice('1.990,50')).toBe(1990.5);
    });

    it('should normalize "1.299,99 €"', () => {
      expect(cleanPrice('1.299,99 €')).toBe(1299.99);
    });

    it('should normalize "99,90"', () => {
      expect(cleanPrice('99,90')).toBe(99.9);
    });

    it('should normalize "1.234.567,89"', () => {
      expect(cleanPrice('1.234.567,89')).toBe(1234567.89);
    });
  });

  describe('US format', () => {
    it('should normalize "1,990.50"', () => {
      expect(cleanPrice('1,990.50')).toBe(1990.5);
    });

    it('should normalize "$1,299.99"', () => {
      expect(cleanPrice('$1,299.99')).toBe(1299.99);
    });

    it('should normalize "£49.00"', () => {
      expect(cleanPrice('£49.00')).toBe(49);
    });
  });

  describe('Lone comma', () => {
    it('should treat a comma followed by two digits as decimal', () => {
      expect(cleanPrice('49,95')).toBe(49.95);
    });

    it('should treat a comma followed by three digits as thousands', () => {
      expect(cleanPrice('1,990')).toBe(1990);
    });

    it('should treat a comma followed by one digit as thousands', () => {
      expect(cleanPrice('12,5')).toBe(125);
    });

    it('should treat repeated commas as thousands', () => {
      expect(cleanPrice('1,234,567')).toBe(1234567);
    });
  });

  describe('Edge cases', () => {
    it('should return null for empty string', () => {
      expect(cleanPrice('')).toBeNull();
    });

    it('should return null for "N/A"', () => {
      expect(cleanPrice('N/A')).toBeNull();
    });

    it('should return null for null and undefined', () => {
      expect(cleanPrice(null)).toBeNull();
      expect(cleanPrice(undefined)).toBeNull();
    });

    it('should return null for zero', () => {
      expect(cleanPrice('0,00')).toBeNull();
    });

    it('should return null at the corruption guard', () => {
      expect(cleanPrice('1 000 000 000')).toBeNull();
      expect(cleanPrice('999 999 999')).toBe(999999999);
    });

    it('should take the first number from surrounding text', () => {
      expect(cleanPrice('Nå 1 490,- før 1 990,-')).toBe(1490);
    });

    it('should round to two decimals', () => {
      expect(cleanPrice('10.006')).toBe(10.01);
    });

    it('should keep a sub-cent amount unrounded', () => {
      expect(cleanPrice('0.004')).toBe(0.004);
      expect(cleanPrice('0.009 €')).toBe(0.009);
    });
  });

  describe('Idempotence', () => {
    it.each(['1990.00', '1990.50', '199.00', '0.99'])(
      'should return the same amount for canonical "%s"',
      (canonical) => {
        const amount = cleanPrice(canonical);
        expect(amount).not.toBeNull();
        expect(cleanPrice(formatPrice(amount ?? 0))).toBe(amount);
      }
    );
  });
});

describe('parsePriceText', () => {
  it('should keep zero', () => {
    expect(parsePriceText('0,00 kr')).toBe(0);
  });

  it('should not round', () => {
    expect(parsePriceText('0.004')).toBe(0.004);
    expect(parsePriceText('10.006')).toBe(10.006);
  });

  it('should keep amounts above the corruption guard', () => {
    expect(parsePriceText('2 000 000 000')).toBe(2000000000);
  });

  it('should return null when there is no number', () => {
    expect(parsePriceText('Ring for pris')).toBeNull();
  });
});

describe('formatPrice', () => {
  it('should format with two decimals', () => {
    expect(formatPrice(1990)).toBe('1990.00');
    expect(formatPrice(1990.5)).toBe('1990.50');
  });

  it('should write sub-cent amounts in full', () => {
    expect(formatPrice(0.004)).toBe('0.004');
    expect(formatPrice(0.01)).toBe('0.01');
  });
});
