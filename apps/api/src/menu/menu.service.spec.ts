import { ConflictException, NotFoundException } from '@nestjs/common';
import { InMemoryDatabase } from '../../test/support/in-memory-database';
import { MenuService } from './menu.service';

describe('MenuService', () => {
  let db: InMemoryDatabase;
  let service: MenuService;

  beforeEach(() => {
    db = new InMemoryDatabase();
    service = new MenuService(db.asService());
  });

  it('lists only available items ordered by name', async () => {
    await db.addMenuItem({ name: 'Veg Burger', price: '149.00' });
    await db.addMenuItem({ name: 'Cold Coffee', price: '110.00' });
    await db.addMenuItem({ name: 'Brownie', price: '140.00', isAvailable: false });

    const menu = await service.listAvailable();
    expect(menu.map((item) => item.name)).toEqual(['Cold Coffee', 'Veg Burger']);
  });

  it('stores prices with two decimals', async () => {
    const created = await service.create({ name: 'Garlic Bread', price: 129.5 });

    expect(created).toEqual({
      id: 1,
      name: 'Garlic Bread',
      description: null,
      price: '129.50',
      isAvailable: true,
      category: null,
    });
  });

  it('rejects a duplicate name and keeps the existing row', async () => {
    await service.create({ name: 'Garlic Bread', price: 129, category: 'Sides' });

    await expect(
      service.create({ name: 'Garlic Bread', price: 1 }),
    ).rejects.toBeInstanceOf(ConflictException);

    const rows = db.menuItems.all();
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({ price: '129.00', category: 'Sides' });
  });

  it('updates price and availability', async () => {
    const item = await db.addMenuItem({ name: 'Cold Coffee', price: '110.00' });

    const updated = await service.update(item.id, {
      price: 120,
      isAvailable: false,
    });

    expect(updated).toMatchObject({ price: '120.00', isAvailable: false });
  });

  it('refuses to rename onto an existing name', async () => {
    await db.addMenuItem({ name: 'Cold Coffee', price: '110.00' });
    const soda = await db.addMenuItem({ name: 'Lime Soda', price: '70.00' });

    await expect(
      service.update(soda.id, { name: 'Cold Coffee' }),
    ).rejects.toBeInstanceOf(ConflictException);
  });

  it('throws NotFoundException for unknown ids', async () => {
    await expect(service.getById(5)).rejects.toBeInstanceOf(NotFoundException);
    await expect(service.update(5, { price: 1 })).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  describe('findAvailableByName', () => {
    it('matches a case-insensitive substring', async () => {
      const pizza = await db.addMenuItem({ name: 'Margherita Pizza', price: '299.00' });

      const found = await service.findAvailableByName('MARGHERITA');
      expect(found?.id).toBe(pizza.id);
    });

    it('returns the lowest id when several names contain the term', async () => {
      const farmhouse = await db.addMenuItem({ name: 'Farmhouse Pizza', price: '349.00' });
      await db.addMenuItem({ name: 'Margherita Pizza', price: '299.00' });

      const found = await service.findAvailableByName('pizza');
      expect(found?.id).toBe(farmhouse.id);
    });

    it('skips unavailable items and blank terms', async () => {
      await db.addMenuItem({ name: 'Chocolate Brownie', price: '140.00', isAvailable: false });

      await expect(service.findAvailableByName('brownie')).resolves.toBeNull();
      await expect(service.findAvailableByName('  ')).resolves.toBeNull();
    });

    it('does not match words that are only similar', async () => {
      await db.addMenuItem({ name: 'Margherita Pizza', price: '299.00' });

      await expect(service.findAvailableByName('margarita')).resolves.toBeNull();
    });
  });
});
