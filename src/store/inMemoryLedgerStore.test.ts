import { describe, it, expect } from 'vitest';
import { Role, type ProductRecord } from '../types/index.js';
import { InMemoryLedgerStore } from './inMemoryLedgerStore.js';

const RECORD: ProductRecord = {
  id: 1,
  name: 'Widget',
  originLocation: 'Lagos',
  batchNumber: 'B-001',
  manufacturer: '0xmaker',
  createdAt: new Date('2026-03-01T12:00:00Z'),
  expirationDate: new Date('2027-01-01T00:00:00Z'),
  completed: false,
};

const ENTRY = {
  inspector: '0xshipper',
  timestamp: new Date('2026-03-02T08:00:00Z'),
  checkpointName: 'port-inspection',
  passed: true,
  notes: '',
};

describe('InMemoryLedgerStore', () => {
  it('starts empty', async () => {
    const store = new InMemoryLedgerStore();
    expect(await store.getRecord(1)).toBeNull();
    expect(await store.getChecks(1)).toEqual([]);
    expect(await store.getProductCount()).toBe(0);
    expect(await store.getDeployer()).toBeNull();
    expect(await store.listRoles('0xmaker')).toEqual([]);
  });

  it('commits staged writes when the work resolves', async () => {
    const store = new InMemoryLedgerStore();
    const id = await store.transaction(async (tx) => {
      const next = await tx.nextProductId();
      await tx.putRecord({ ...RECORD, id: next });
      await tx.appendCheck(next, ENTRY);
      await tx.setRole('0xmaker', Role.MANUFACTURER, true);
      await tx.setDeployer('0xadmin');
      return next;
    });

    expect(id).toBe(1);
    expect(await store.getRecord(1)).toEqual(RECORD);
    expect(await store.getChecks(1)).toEqual([ENTRY]);
    expect(await store.getProductCount()).toBe(1);
    expect(await store.hasRole('0xmaker', Role.MANUFACTURER)).toBe(true);
    expect(await store.getDeployer()).toBe('0xadmin');
  });

  it('discards every staged write when the work rejects', async () => {
    const store = new InMemoryLedgerStore();
    await expect(
      store.transaction(async (tx) => {
        await tx.nextProductId();
        await tx.putRecord(RECORD);
        await tx.appendCheck(1, ENTRY);
        await tx.setRole('0xmaker', Role.MANUFACTURER, true);
        throw new Error('rejected');
      }),
    ).rejects.toThrow('rejected');

    expect(await store.getRecord(1)).toBeNull();
    expect(await store.getChecks(1)).toEqual([]);
    expect(await store.getProductCount()).toBe(0);
    expect(await store.hasRole('0xmaker', Role.MANUFACTURER)).toBe(false);
  });

  it('lets a transaction read its own staged writes', async () => {
    const store = new InMemoryLedgerStore();
    await store.transaction(async (tx) => {
      await tx.appendCheck(1, ENTRY);
    });

    await store.transaction(async (tx) => {
      await tx.setRole('0xshop', Role.RETAILER, true);
      await tx.appendCheck(1, { ...ENTRY, checkpointName: 'shelf' });

      expect(await tx.hasRole('0xshop', Role.RETAILER)).toBe(true);
      expect(await store.hasRole('0xshop', Role.RETAILER)).toBe(false);
      expect((await tx.getChecks(1)).map((c) => c.checkpointName)).toEqual([
        'port-inspection',
        'shelf',
      ]);
    });

    expect((await store.getChecks(1)).map((c) => c.checkpointName)).toEqual([
      'port-inspection',
      'shelf',
    ]);
  });

  it('lists roles in fixed order and forgets revoked ones', async () => {
    const store = new InMemoryLedgerStore();
    await store.transaction(async (tx) => {
      await tx.setRole('0xadmin', Role.RETAILER, true);
      await tx.setRole('0xadmin', Role.ADMIN, true);
      await tx.setRole('0xadmin', Role.DISTRIBUTOR, true);
    });
    expect(await store.listRoles('0xadmin')).toEqual([Role.ADMIN, Role.DISTRIBUTOR, Role.RETAILER]);

    await store.transaction(async (tx) => {
      await tx.setRole('0xadmin', Role.DISTRIBUTOR, false);
      expect(await tx.listRoles('0xadmin')).toEqual([Role.ADMIN, Role.RETAILER]);
    });
    expect(await store.listRoles('0xadmin')).toEqual([Role.ADMIN, Role.RETAILER]);
  });

  it('copies records on the way in and out', async () => {
    const store = new InMemoryLedgerStore();
    const input = { ...RECORD, expirationDate: new Date(RECORD.expirationDate.getTime()) };
    await store.transaction((tx) => tx.putRecord(input));

    input.expirationDate.setUTCFullYear(2030);
    const read = await store.getRecord(1);
    read?.createdAt.setUTCFullYear(1999);

    expect(await store.getRecord(1)).toEqual(RECORD);
  });
});
