import { Logger, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { Decimal } from '../../common/money';
import { UnitOfWork } from '../../db/unit-of-work.service';
import { CostingRepository } from '../costing.repository';
import { CostingService } from '../costing.service';

const d = (v: number) => new Decimal(v);

const tx = { query: jest.fn() };
const events = { dispatch: jest.fn() };
const mockUow = {
  run: jest.fn(
    (work: (ctx: { tx: typeof tx; events: typeof events }) => Promise<unknown>) =>
      work({ tx, events }),
  ),
};
const mockRepo = {
  lockProduct: jest.fn(),
  productExists: jest.fn(),
  updateCost: jest.fn(),
  insertHistory: jest.fn(),
  findHistory: jest.fn(),
};

describe('CostingService', () => {
  let service: CostingService;

  beforeAll(() => Logger.overrideLogger(false));

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CostingService,
        { provide: UnitOfWork, useValue: mockUow },
        { provide: CostingRepository, useValue: mockRepo },
      ],
    }).compile();

    service = module.get<CostingService>(CostingService);
  });

  it('updates cost, writes history and dispatches the change', async () => {
    mockRepo.lockProduct.mockResolvedValue({
      id: 1,
      code: 'P-1',
      cost: d(5),
      stockQuantity: d(20),
    });
    mockRepo.insertHistory.mockResolvedValue(11);

    const res = await service.applyStockReceipt({
      productId: 1,
      purchasePrice: 7,
      quantityReceived: 10,
      stockOnHandBefore: 10,
      stockOnHandAfter: 20,
      purchaseOrderId: 3,
    });

    expect(res).toEqual({
      productId: 1,
      oldCost: 5,
      newCost: 6,
      oldStock: 10,
      newStock: 20,
      costChanged: true,
      historyId: 11,
    });
    expect(mockRepo.updateCost).toHaveBeenCalledWith(tx, 1, d(6));
    expect(mockRepo.insertHistory.mock.calls[0][2]).toEqual({
      reason: 'Recepción de orden de compra #3',
      purchaseOrderId: 3,
      purchaseOrderLineId: null,
    });
    expect(events.dispatch).toHaveBeenCalledWith({
      type: 'product.cost_changed',
      productId: 1,
      oldCost: '5.00',
      newCost: '6.00',
      purchaseOrderId: 3,
    });
  });

  it('leaves cost and history untouched when the average does not move', async () => {
    mockRepo.lockProduct.mockResolvedValue({
      id: 1,
      code: 'P-1',
      cost: d(5),
      stockQuantity: d(15),
    });

    const res = await service.applyStockReceipt({
      productId: 1,
      purchasePrice: 5,
      quantityReceived: 5,
      stockOnHandBefore: 10,
      stockOnHandAfter: 15,
    });

    expect(res.costChanged).toBe(false);
    expect(res.historyId).toBeNull();
    expect(mockRepo.updateCost).not.toHaveBeenCalled();
    expect(mockRepo.insertHistory).not.toHaveBeenCalled();
    expect(events.dispatch).not.toHaveBeenCalled();
  });

  it('rejects a receipt whose stock levels do not add up', async () => {
    mockRepo.lockProduct.mockResolvedValue({
      id: 1,
      code: 'P-1',
      cost: d(5),
      stockQuantity: d(25),
    });

    await expect(
      service.applyStockReceipt({
        productId: 1,
        purchasePrice: 7,
        quantityReceived: 10,
        stockOnHandBefore: 10,
        stockOnHandAfter: 25,
      }),
    ).rejects.toThrow('Stock inconsistente: 10 + 10 ≠ 25');
  });

  it('reports an unknown product', async () => {
    mockRepo.lockProduct.mockResolvedValue(null);
    await expect(
      service.applyStockReceipt({
        productId: 9,
        purchasePrice: 1,
        quantityReceived: 1,
        stockOnHandBefore: 0,
        stockOnHandAfter: 1,
      }),
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('lists history for a known product only', async () => {
    mockRepo.productExists.mockResolvedValueOnce(false);
    await expect(service.costHistory(9)).rejects.toThrow('Producto no encontrado');

    const changedAt = new Date('2024-03-01T10:00:00Z');
    mockRepo.productExists.mockResolvedValueOnce(true);
    mockRepo.findHistory.mockResolvedValue([
      {
        id: 4,
        productId: 1,
        oldCost: null,
        newCost: d(5),
        oldStock: d(0),
        newStock: d(10),
        purchasePrice: d(5),
        quantityReceived: d(10),
        reason: 'Recepción de mercancía',
        purchaseOrderId: null,
        purchaseOrderLineId: null,
        changedAt,
      },
    ]);
    const rows = await service.costHistory(1);
    expect(rows).toEqual([
      {
        id: 4,
        productId: 1,
        oldCost: null,
        newCost: 5,
        oldStock: 0,
        newStock: 10,
        purchasePrice: 5,
        quantityReceived: 10,
        reason: 'Recepción de mercancía',
        purchaseOrderId: null,
        purchaseOrderLineId: null,
        changedAt,
      },
    ]);
  });
});
