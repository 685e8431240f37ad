import {
  cleanDeltas,
  cleanItems,
  decodePayload,
  orderIdOf,
  roundToCents,
  toInteger,
  totalsByProduct,
} from '../order-payload';

describe('order payload helpers', () => {
  describe('decodePayload', () => {
    it('should decode a JSON object', () => {
      expect(decodePayload(Buffer.from('{"order_id":7,"items":[]}'))).toEqual({
        order_id: 7,
        items: [],
      });
    });

    it('should wrap undecodable bytes as { raw }', () => {
      const raw = Buffer.from('not json');

      expect(decodePayload(raw)).toEqual({ raw });
    });

    it('should wrap a body that is not valid UTF-8 as { raw }', () => {
      const raw = Buffer.concat([
        Buffer.from('{"name":"'),
        Buffer.from([0xff]),
        Buffer.from('"}'),
      ]);

      expect(decodePayload(raw)).toEqual({ raw });
    });

    it('should wrap JSON that is not an object as { raw }', () => {
      const raw = Buffer.from('[1,2]');

      expect(decodePayload(raw).raw).toBe(raw);
    });
  });

  describe('toInteger', () => {
    it('should accept integers and integer strings only', () => {
      expect(toInteger(3)).toBe(3);
      expect(toInteger(' 12 ')).toBe(12);
      expect(toInteger('-4')).toBe(-4);
      expect(toInteger(2.5)).toBeUndefined();
      expect(toInteger('2.5')).toBeUndefined();
      expect(toInteger(true)).toBeUndefined();
      expect(toInteger(null)).toBeUndefined();
    });
  });

  describe('orderIdOf', () => {
    it('should prefer order_id and fall back to id', () => {
      expect(orderIdOf({ order_id: 'A-1', id: 9 })).toBe('A-1');
      expect(orderIdOf({ id: 9 })).toBe(9);
      expect(orderIdOf({})).toBeNull();
    });
  });

  describe('cleanItems', () => {
    it('should keep well-formed items and report the rest', () => {
      const result = cleanItems({
        items: [
          { product_id: 1, quantity: 2 },
          { product_id: '3', quantity: '4' },
          { product_id: 5, quantity: -1 },
          { product_id: 'x', quantity: 1 },
          'garbage',
        ],
      });

      expect(result.accepted).toEqual([
        { productId: 1, quantity: 2 },
        { productId: 3, quantity: 4 },
      ]);
      expect(result.dropped.map(({ reason }) => reason)).toEqual([
        'negative quantity',
        'invalid product_id or quantity',
        'not an object',
      ]);
    });

    it('should treat a non-array items field as empty', () => {
      expect(cleanItems({ items: 'nope' })).toEqual({ accepted: [], dropped: [] });
    });
  });

  describe('cleanDeltas', () => {
    it('should drop malformed and zero deltas', () => {
      const result = cleanDeltas({
        deltas: [{ foo: 'bar' }, { product_id: 1, delta: 0 }, { product_id: 2, delta: -3 }],
      });

      expect(result.accepted).toEqual([{ productId: 2, delta: -3 }]);
      expect(result.dropped).toEqual([
        { entry: { foo: 'bar' }, reason: 'invalid product_id or delta' },
        { entry: { product_id: 1, delta: 0 }, reason: 'zero delta' },
      ]);
    });
  });

  describe('totalsByProduct', () => {
    it('should sum amounts of repeated products', () => {
      const totals = totalsByProduct([
        { productId: 1, amount: 2 },
        { productId: 2, amount: 1 },
        { productId: 1, amount: 3 },
      ]);

      expect([...totals.entries()]).toEqual([
        [1, 5],
        [2, 1],
      ]);
    });
  });

  it('should round money to cents', () => {
    expect(roundToCents(19.99 * 3)).toBe(59.97);
    expect(roundToCents(0.1 + 0.2)).toBe(0.3);
  });
});
