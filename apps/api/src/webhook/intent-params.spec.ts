import {
  asInteger,
  pickParam,
  readAddress,
  readCustomerName,
  readOrderId,
  readPhone,
  readRequestedItems,
} from './intent-params';

describe('intent parameter resolution', () => {
  it('takes the first alias that holds a value', () => {
    const params = { phone: '', 'phone-number': '9999999999', phone_number: '111' };
    expect(pickParam(params, ['phone', 'phone-number', 'phone_number'])).toBe(
      '9999999999',
    );
  });

  it('reads phone, address and name through their aliases', () => {
    const params = {
      phoneNumber: 9876543210,
      'street-address': '22 Baker Lane',
      person: { name: 'Noor' },
    };

    expect(readPhone(params)).toBe('9876543210');
    expect(readAddress(params)).toBe('22 Baker Lane');
    expect(readCustomerName(params)).toBe('Noor');
  });

  it('returns null when nothing usable is present', () => {
    expect(readPhone({ phone: '   ' })).toBeNull();
    expect(readAddress({})).toBeNull();
  });

  describe('readOrderId', () => {
    it('truncates floats and numeric strings', () => {
      expect(readOrderId({ order_id: 101 })).toBe(101);
      expect(readOrderId({ orderId: '42' })).toBe(42);
      expect(readOrderId({ number: 12.0 })).toBe(12);
    });

    it('falls back to 0 when absent or unusable', () => {
      expect(readOrderId({})).toBe(0);
      expect(readOrderId({ order_id: 'abc' })).toBe(0);
      expect(readOrderId({ order_id: -3 })).toBe(0);
    });
  });

  describe('readRequestedItems', () => {
    it('reads an item list with per-item aliases', () => {
      expect(
        readRequestedItems({
          items: [
            { food: 'margherita', number: 2 },
            { dish: 'cold coffee', qty: '1' },
            { item: 'fries' },
          ],
        }),
      ).toEqual([
        { name: 'margherita', quantity: 2 },
        { name: 'cold coffee', quantity: 1 },
        { name: 'fries', quantity: null },
      ]);
    });

    it('accepts plain strings inside the list and drops nameless entries', () => {
      expect(
        readRequestedItems({ order_items: ['dosa', { number: 3 }, 7] }),
      ).toEqual([{ name: 'dosa', quantity: null }]);
    });

    it('zips parallel name and number lists', () => {
      expect(
        readRequestedItems({ food_item: ['burger', 'lime soda'], number: [2] }),
      ).toEqual([
        { name: 'burger', quantity: 2 },
        { name: 'lime soda', quantity: null },
      ]);
    });

    it('returns an empty list when no items are given', () => {
      expect(readRequestedItems({ phone: '1' })).toEqual([]);
    });
  });

  it('parses integers from numbers, strings and single-element lists', () => {
    expect(asInteger(3.9)).toBe(3);
    expect(asInteger(' 5 ')).toBe(5);
    expect(asInteger([4])).toBe(4);
    expect(asInteger('two')).toBeNull();
    expect(asInteger('')).toBeNull();
  });
});
