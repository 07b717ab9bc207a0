import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DuplicateReason,
  IntakeErrorCode,
  OrderAuditAction,
  OrderStatus,
  ReuseNotice,
} from '@careplan/shared/constants/order.constants.js';
import { buildTestApp, type TestApp } from '../../helpers/test-app.js';
import { submission } from '../../helpers/fixtures.js';

let ctx: TestApp;

beforeEach(async () => {
  ctx = await buildTestApp();
});

afterEach(async () => {
  await ctx.app.close();
});

function postOrder(payload: unknown) {
  return ctx.app.inject({
    method: 'POST',
    url: '/api/v1/orders',
    headers: { 'content-type': 'application/json' },
    payload: JSON.stringify(payload),
  });
}

// ---------------------------------------------------------------------------
// POST /api/v1/orders
// ---------------------------------------------------------------------------

describe('POST /api/v1/orders', () => {
  it('creates a pending order and returns its polling URLs', async () => {
    const res = await postOrder(submission());

    expect(res.statusCode).toBe(201);
    const body = res.json();
    const orderId = ctx.store.state.orders[0]?.orderId;
    expect(body).toEqual({
      data: {
        order_id: orderId,
        status: OrderStatus.PENDING,
        status_url: `/api/v1/orders/${orderId}/status`,
        document_url: `/api/v1/orders/${orderId}/document`,
        confirmed_warnings: [],
      },
      notices: [],
    });
    expect(ctx.queue.snapshot()).toHaveLength(1);
  });

  it('returns every invalid field at once', async () => {
    const res = await postOrder(
      submission({
        patient: { mrn: '12345', primary_diagnosis_code: '70.01' },
        provider: { npi: '1234567890' },
      }),
    );

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.type).toBe('error');
    expect(body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Validation failed' });
    expect(body.errors.map((e: { field: string }) => e.field)).toEqual([
      'patient.mrn',
      'patient.primary_diagnosis_code',
      'provider.npi',
    ]);
    expect(ctx.store.state.orders).toEqual([]);
  });

  it('rejects a body that is not an object', async () => {
    const res = await postOrder(['not', 'an', 'order']);
    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
  });

  it('blocks a same-day duplicate with reuse notices', async () => {
    await postOrder(submission());
    const res = await postOrder(submission({ confirm_not_duplicate: true }));

    expect(res.statusCode).toBe(409);
    expect(res.json()).toEqual({
      type: 'error',
      error: { code: 'DUPLICATE_BLOCKED', message: 'Submission blocked by duplicate check' },
      errors: [
        { code: IntakeErrorCode.ORDER_SAME_DAY_DUPLICATE, message: DuplicateReason.ORDER_SAME_DAY },
      ],
      notices: [ReuseNotice.PROVIDER, ReuseNotice.PATIENT],
    });
    expect(ctx.store.state.orders).toHaveLength(1);
  });

  it('warns about a patient under another MRN, then accepts the confirmation', async () => {
    await postOrder(submission());

    const warned = await postOrder(submission({ patient: { mrn: '300400' } }));
    expect(warned.statusCode).toBe(409);
    expect(warned.json()).toEqual({
      type: 'warning',
      error: {
        code: 'DUPLICATE_WARNING',
        message: 'Possible duplicate: resubmit with confirm_not_duplicate to proceed',
      },
      warnings: [
        { code: IntakeErrorCode.PATIENT_DUPLICATE_WARNING, message: DuplicateReason.PATIENT_OTHER_MRN },
      ],
      notices: [ReuseNotice.PROVIDER],
    });

    const confirmed = await postOrder(
      submission({ patient: { mrn: '300400' }, confirm_not_duplicate: true }),
    );
    expect(confirmed.statusCode).toBe(201);
    expect(confirmed.json().data.confirmed_warnings).toEqual([
      { code: IntakeErrorCode.PATIENT_DUPLICATE_WARNING, message: DuplicateReason.PATIENT_OTHER_MRN },
    ]);
    expect(ctx.audit.actions()).toEqual([
      OrderAuditAction.CREATED,
      OrderAuditAction.CREATED,
      OrderAuditAction.DUPLICATE_CONFIRMED,
    ]);
  });

  it('blocks an NPI registered to a different provider name', async () => {
    await postOrder(submission());
    const res = await postOrder(
      submission({ patient: { mrn: '300400', first_name: 'John' }, provider: { name: 'Dr. Someone Else' } }),
    );

    expect(res.statusCode).toBe(409);
    expect(res.json().errors).toEqual([
      { code: IntakeErrorCode.PROVIDER_NPI_CONFLICT, message: DuplicateReason.NPI_NAME_MISMATCH },
    ]);
  });
});

// ---------------------------------------------------------------------------
// POST /api/v1/orders/intake/:source
// ---------------------------------------------------------------------------

describe('POST /api/v1/orders/intake/:source', () => {
  it('accepts a pipe-delimited nordic payload', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/orders/intake/nordic',
      headers: { 'content-type': 'text/plain' },
      payload: [
        'PATIENT|Jane|Doe|100200|1979/06/08',
        'DOCTOR|Dr. Ada Lane|1234567893',
        'ORDER|IVIG|G70.01|I10|',
      ].join('\n'),
    });

    expect(res.statusCode).toBe(201);
    expect(res.json().data.status).toBe(OrderStatus.PENDING);
    expect(ctx.store.state.orders.map((o) => o.source)).toEqual(['nordic']);
    expect(ctx.store.state.patients.map((p) => p.dateOfBirth)).toEqual(['1979-06-08']);
  });

  it('accepts a pharmacorp XML payload', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/orders/intake/pharmacorp',
      headers: { 'content-type': 'application/xml' },
      payload: [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<PharmacyOrder>',
        '  <Patient><GivenName>James</GivenName><SurName>Wilson</SurName>',
        '    <MedRecordNum>112233</MedRecordNum><DateOfBirth>11-20-1990</DateOfBirth></Patient>',
        '  <Prescriber><FullName>Dr. Rachel Kim</FullName>',
        '    <NationalProviderId>1245319599</NationalProviderId></Prescriber>',
        '  <ClinicalInfo><DrugName>Ocrevus</DrugName><PrimaryDiagCode>G35</PrimaryDiagCode></ClinicalInfo>',
        '  <OtherDiagCodes><Code>I10</Code></OtherDiagCodes>',
        '</PharmacyOrder>',
      ].join('\n'),
    });

    expect(res.statusCode).toBe(201);
    expect(ctx.store.state.orders.map((o) => [o.source, o.medicationName])).toEqual([
      ['pharmacorp', 'Ocrevus'],
    ]);
    expect(ctx.store.state.patients.map((p) => p.dateOfBirth)).toEqual(['1990-11-20']);
  });

  it('reports field errors from a pharmacorp payload', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/orders/intake/pharmacorp',
      headers: { 'content-type': 'text/xml' },
      payload:
        '<PharmacyOrder><Patient><GivenName>James</GivenName><SurName>Wilson</SurName>' +
        '<MedRecordNum>112233</MedRecordNum><DateOfBirth>11-20-1990</DateOfBirth></Patient>' +
        '<Prescriber><FullName>Dr. Rachel Kim</FullName><NationalProviderId>1245319590</NationalProviderId></Prescriber>' +
        '<ClinicalInfo><DrugName>Ocrevus</DrugName><PrimaryDiagCode>G35</PrimaryDiagCode></ClinicalInfo>' +
        '</PharmacyOrder>',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().errors).toEqual([
      { field: 'provider.npi', message: 'NPI failed check digit validation' },
    ]);
  });

  it('accepts the canonical body under the web source', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/orders/intake/web',
      payload: JSON.stringify(submission()),
      headers: { 'content-type': 'application/json' },
    });
    expect(res.statusCode).toBe(201);
  });

  it('rejects an unregistered source', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/orders/intake/acme_health',
      payload: JSON.stringify(submission()),
      headers: { 'content-type': 'application/json' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      type: 'error',
      error: {
        code: IntakeErrorCode.UNKNOWN_SOURCE,
        message: "Unknown intake source 'acme_health'. Available: web, clinic_b, nordic, pharmacorp",
      },
      errors: [{ field: 'source', message: 'Unknown intake source' }],
    });
  });

  it('reports an unreadable nordic payload as an adapter error', async () => {
    const res = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/orders/intake/nordic',
      headers: { 'content-type': 'text/plain' },
      payload: 'PATIENT|Jane|Doe|100200|1979/06/08',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toEqual({
      code: IntakeErrorCode.ADAPTER_ERROR,
      message: 'Could not read nordic payload: expected PATIENT, DOCTOR and ORDER lines',
    });
  });
});
