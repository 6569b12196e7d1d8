// src/db/__tests__/unit-of-work.spec.ts
import { Test } from '@nestjs/testing';
import { DatabaseService } from '../database.service';
import { UnitOfWork } from '../unit-of-work.service';

describe('UnitOfWork', () => {
  const client = { query: jest.fn() };
  const transaction = jest.fn(
    (work: (tx: typeof client) => Promise<unknown>) => work(client),
  );
  let uow: UnitOfWork;

  beforeEach(async () => {
    jest.clearAllMocks();
    const mod = await Test.createTestingModule({
      providers: [
        UnitOfWork,
        { provide: DatabaseService, useValue: { transaction } },
      ],
    }).compile();
    uow = mod.get(UnitOfWork);
  });

  it('runs the work inside a transaction', async () => {
    const result = await uow.run(async ({ tx }) => {
      expect(tx).toBe(client);
      return 42;
    });
    expect(result).toBe(42);
    expect(transaction).toHaveBeenCalledTimes(1);
  });

  it('delivers events to subscribers on the same connection', async () => {
    const handler = jest.fn();
    uow.subscribe('payment.allocated', handler);
    const event = {
      type: 'payment.allocated' as const,
      paymentId: 1,
      invoiceId: 2,
      amount: '10.00',
    };
    await uow.run(({ events }) => events.dispatch(event));
    expect(handler).toHaveBeenCalledWith(event, client);
  });

  it('propagates the work error', async () => {
    await expect(
      uow.run(async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });
});
