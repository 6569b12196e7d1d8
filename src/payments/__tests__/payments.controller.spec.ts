import {
  ConflictException,
  INestApplication,
  ValidationPipe,
} from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { PaymentsController } from '../payments.controller';
import { PaymentsService } from '../payments.service';

const mockSvc = {
  createPayment: jest.fn(),
  previewAllocation: jest.fn(),
  getPayment: jest.fn(),
  allocatePayment: jest.fn(),
  autoAllocate: jest.fn(),
  confirmPayment: jest.fn(),
  cancelPayment: jest.fn(),
  reconcilePayment: jest.fn(),
};

describe('PaymentsController (http)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [PaymentsController],
      providers: [{ provide: PaymentsService, useValue: mockSvc }],
    }).compile();

    app = moduleRef.createNestApplication();
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => jest.clearAllMocks());

  it('creates a payment from a valid body', async () => {
    mockSvc.createPayment.mockResolvedValue({ id: 20, status: 'confirmed' });

    const res = await request(app.getHttpServer())
      .post('/payments')
      .send({
        customerId: 7,
        method: 'cash',
        amount: 120.5,
        allocations: [{ invoiceId: 1, amount: 120.5 }],
        ignored: 'x',
      })
      .expect(201);

    expect(res.body).toEqual({ id: 20, status: 'confirmed' });
    const dto = mockSvc.createPayment.mock.calls[0][0];
    expect(dto.customerId).toBe(7);
    expect(dto.allocations).toEqual([{ invoiceId: 1, amount: 120.5 }]);
    expect(dto.ignored).toBeUndefined();
  });

  it('rejects a non-positive amount and an unknown method', async () => {
    await request(app.getHttpServer())
      .post('/payments')
      .send({ customerId: 7, method: 'barter', amount: 0 })
      .expect(400);
    expect(mockSvc.createPayment).not.toHaveBeenCalled();
  });

  it('rejects amounts with more than 2 decimals', async () => {
    await request(app.getHttpServer())
      .post('/payments')
      .send({ customerId: 7, method: 'cash', amount: 100.005 })
      .expect(400);
    await request(app.getHttpServer())
      .post('/payments')
      .send({
        customerId: 7,
        method: 'cash',
        amount: 100,
        allocations: [{ invoiceId: 1, amount: 10.001 }],
      })
      .expect(400);
    await request(app.getHttpServer())
      .get('/payments/preview?customerId=7&amount=10.005')
      .expect(400);
    expect(mockSvc.createPayment).not.toHaveBeenCalled();
    expect(mockSvc.previewAllocation).not.toHaveBeenCalled();
  });

  it('parses the preview query', async () => {
    mockSvc.previewAllocation.mockResolvedValue({ allocations: [] });

    await request(app.getHttpServer())
      .get('/payments/preview?customerId=7&amount=100&strategy=proportional')
      .expect(200);

    expect(mockSvc.previewAllocation).toHaveBeenCalledWith(7, 100, 'proportional');
  });

  it('rejects a non-numeric id', async () => {
    await request(app.getHttpServer()).get('/payments/abc').expect(400);
    expect(mockSvc.getPayment).not.toHaveBeenCalled();
  });

  it('maps policy violations to 409', async () => {
    mockSvc.confirmPayment.mockRejectedValue(
      new ConflictException('Solo se confirman pagos pendientes (estado actual: confirmed)'),
    );

    const res = await request(app.getHttpServer())
      .post('/payments/20/confirm')
      .expect(409);
    expect(res.body.message).toBe(
      'Solo se confirman pagos pendientes (estado actual: confirmed)',
    );
  });
});
