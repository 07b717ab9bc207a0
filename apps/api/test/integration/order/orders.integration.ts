import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IntakeErrorCode, OrderStatus } from '@careplan/shared/constants/order.constants.js';
import { buildTestApp, type TestApp } from '../../helpers/test-app.js';
import { OTHER_VALID_NPI, seedOrder } from '../../helpers/fixtures.js';
import { EXPORT_HEADERS } from '../../../src/domains/order/order.service.js';

let ctx: TestApp;

const MISSING_ID = '3f0c2d9e-8b1a-4c57-9e2f-1d6a7b8c9e00';

beforeEach(async () => {
  ctx = await buildTestApp();
});

afterEach(async () => {
  await ctx.app.close();
});

async function seedCompleted(
  content = 'PROBLEM LIST\n- generalized myasthenia gravis',
  medicationName = 'IVIG',
) {
  const order = await seedOrder(ctx.store, {
    status: OrderStatus.PROCESSING,
    medicationName,
    createdAt: new Date('2026-03-10T15:00:00.000Z'),
  });
  await ctx.store.repo.completeOrder(order.orderId, order.jobId ?? '', {
    content,
    model: 'test-model',
    generationTimeMs: 1200,
    generatedAt: new Date('2026-03-10T16:45:00.000Z'),
  });
  return order;
}

function get(url: string) {
  return ctx.app.inject({ method: 'GET', url });
}

// ---------------------------------------------------------------------------
// Infrastructure
// ---------------------------------------------------------------------------

describe('infrastructure', () => {
  it('answers the health check', async () => {
    const res = await get('/health');
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('returns a JSON 404 for unknown routes', async () => {
    const res = await get('/api/v1/unknown');
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      type: 'error',
      error: { code: 'NOT_FOUND', message: 'Route not found' },
    });
  });
});

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

describe('GET /api/v1/orders/:id/status', () => {
  it('reports a pending order with a polling hint', async () => {
    const order = await seedOrder(ctx.store);
    const res = await get(`/api/v1/orders/${order.orderId}/status`);

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      data: {
        order_id: order.orderId,
        status: OrderStatus.PENDING,
        document_available: false,
        error_message: null,
        terminal: false,
        poll_after_ms: 3000,
      },
    });
  });

  it('returns 404 for an unknown order', async () => {
    const res = await get(`/api/v1/orders/${MISSING_ID}/status`);
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toEqual({ code: 'NOT_FOUND', message: 'Order not found' });
  });

  it('rejects an id that is not a UUID', async () => {
    const res = await get('/api/v1/orders/not-a-uuid/status');
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });
});

describe('GET /api/v1/orders', () => {
  it('lists orders with pagination', async () => {
    await seedOrder(ctx.store, { medicationName: 'IVIG' });
    await seedOrder(ctx.store, { medicationName: 'Rituximab', mrn: '300400' });

    const res = await get('/api/v1/orders?search=ritux&page_size=5');
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data).toHaveLength(1);
    expect(body.data[0].medication_name).toBe('Rituximab');
    expect(body.pagination).toEqual({ total: 1, page: 1, pageSize: 5, hasMore: false });
  });

  it('rejects an unknown status filter', async () => {
    const res = await get('/api/v1/orders?status=archived');
    expect(res.statusCode).toBe(400);
  });
});

describe('GET /api/v1/orders/:id', () => {
  it('returns the order with its patient and provider', async () => {
    const order = await seedOrder(ctx.store);
    const res = await get(`/api/v1/orders/${order.orderId}`);

    expect(res.statusCode).toBe(200);
    const { data } = res.json();
    expect(data.order_id).toBe(order.orderId);
    expect(data.patient.mrn).toBe('100200');
    expect(data.provider.npi).toBe('1234567893');
  });
});

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

describe('GET /api/v1/orders/:id/document', () => {
  it('returns 404 until the plan exists', async () => {
    const order = await seedOrder(ctx.store);
    const res = await get(`/api/v1/orders/${order.orderId}/document`);
    expect(res.statusCode).toBe(404);
    expect(res.json().error).toEqual({ code: 'NOT_FOUND', message: 'Care plan not found' });
  });

  it('returns the plan for a completed order', async () => {
    const order = await seedCompleted();
    const res = await get(`/api/v1/orders/${order.orderId}/document`);

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({
      order_id: order.orderId,
      content: 'PROBLEM LIST\n- generalized myasthenia gravis',
      model: 'test-model',
      generated_at: '2026-03-10T16:45:00.000Z',
      generation_time_ms: 1200,
      prompt_tokens: null,
      completion_tokens: null,
    });
  });
});

describe('GET /api/v1/orders/:id/document/download', () => {
  it('serves the plan as a text attachment', async () => {
    const order = await seedCompleted();
    const res = await get(`/api/v1/orders/${order.orderId}/document/download`);

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.headers['content-disposition']).toBe(
      `attachment; filename="careplan_100200_IVIG_2026-03-10.txt"; filename*=UTF-8''careplan_100200_IVIG_2026-03-10.txt`,
    );
    expect(res.body.split('\n').slice(0, 3)).toEqual([
      'PHARMACEUTICAL CARE PLAN',
      '='.repeat(50),
      'Patient: Jane Doe',
    ]);
    expect(res.body.endsWith('PROBLEM LIST\n- generalized myasthenia gravis\n')).toBe(true);
  });

  it('serves a plan whose medication name is outside Latin-1', async () => {
    const order = await seedCompleted('GOALS\n- remission', 'Humira™ Pen');
    const res = await get(`/api/v1/orders/${order.orderId}/document/download`);

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-disposition']).toBe(
      `attachment; filename="careplan_100200_Humira__Pen_2026-03-10.txt"; filename*=UTF-8''careplan_100200_Humira%E2%84%A2_Pen_2026-03-10.txt`,
    );
    expect(res.body).toContain('Medication: Humira™ Pen');
  });
});

// ---------------------------------------------------------------------------
// Regenerate
// ---------------------------------------------------------------------------

describe('POST /api/v1/orders/:id/regenerate', () => {
  it('accepts a completed order and queues a new job', async () => {
    const order = await seedCompleted();
    const res = await ctx.app.inject({
      method: 'POST',
      url: `/api/v1/orders/${order.orderId}/regenerate`,
    });

    expect(res.statusCode).toBe(202);
    expect(res.json().data).toEqual({
      order_id: order.orderId,
      status: OrderStatus.PENDING,
      document_available: false,
      error_message: null,
      terminal: false,
      poll_after_ms: 3000,
    });
    expect(ctx.queue.snapshot()).toHaveLength(1);

    const document = await get(`/api/v1/orders/${order.orderId}/document`);
    expect(document.statusCode).toBe(404);
  });

  it('refuses while generation is in progress', async () => {
    const order = await seedOrder(ctx.store, { status: OrderStatus.PROCESSING });
    const res = await ctx.app.inject({
      method: 'POST',
      url: `/api/v1/orders/${order.orderId}/regenerate`,
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      type: 'error',
      error: {
        code: IntakeErrorCode.GENERATION_IN_PROGRESS,
        message: 'Care plan generation is in progress; try again when it finishes',
      },
    });
  });

  it('refuses an order that is already queued', async () => {
    const order = await seedOrder(ctx.store);
    const res = await ctx.app.inject({
      method: 'POST',
      url: `/api/v1/orders/${order.orderId}/regenerate`,
    });

    expect(res.statusCode).toBe(409);
    expect(res.json().error.code).toBe(IntakeErrorCode.GENERATION_QUEUED);
  });
});

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

describe('GET /api/v1/orders/export', () => {
  it('downloads matching orders as CSV', async () => {
    await seedCompleted();
    await seedOrder(ctx.store, { medicationName: 'Rituximab', npi: OTHER_VALID_NPI });

    const res = await get('/api/v1/orders/export?provider_npi=1234567893');

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.headers['content-disposition']).toMatch(
      /^attachment; filename="orders_export_(\d{4}-\d{2}-\d{2})\.csv"; filename\*=UTF-8''orders_export_\1\.csv$/,
    );
    const lines = res.body.split('\n');
    expect(lines[0]).toBe(EXPORT_HEADERS.join(','));
    expect(lines[1]).toContain(',IVIG,G70.01,2026-03-10 16:45,"PROBLEM LIST');
    expect(lines.filter((line) => line.includes('Rituximab'))).toEqual([]);
  });

  it('rejects a start date after the end date', async () => {
    const res = await get('/api/v1/orders/export?start_date=2026-03-05&end_date=2026-03-01');
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('is rate limited to five requests a minute', async () => {
    const statuses: number[] = [];
    for (let i = 0; i < 6; i++) {
      statuses.push((await get('/api/v1/orders/export')).statusCode);
    }
    expect(statuses).toEqual([200, 200, 200, 200, 200, 429]);
  });
});
