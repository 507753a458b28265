/**
 * Request validation and request IDs
 */

import express from 'express';
import request from 'supertest';
import { z } from 'zod';
import { requestIdMiddleware } from '../requestId';
import { validateRequest } from '../validateRequest';

const app = express();
app.use(express.json());
app.use(requestIdMiddleware);
app.post(
  '/items/:itemId',
  validateRequest({ params: z.object({ itemId: z.string().regex(/^ITEM_\d+$/) }), body: z.object({ name: z.string().min(1) }) }),
  (req, res) => {
    res.status(201).json({ itemId: req.params.itemId, name: req.body.name });
  }
);

describe('validateRequest', () => {
  it('passes valid requests through', async () => {
    const res = await request(app).post('/items/ITEM_1').send({ name: 'Pen' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ itemId: 'ITEM_1', name: 'Pen' });
  });

  it('answers 400 with the failing fields', async () => {
    const res = await request(app).post('/items/ITEM_1').send({ name: '' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      message: 'Validation error',
      errors: [{ field: 'name', message: 'String must contain at least 1 character(s)' }],
    });
  });
});

describe('requestIdMiddleware', () => {
  it('generates an ID when none is sent', async () => {
    const res = await request(app).post('/items/ITEM_2').send({ name: 'Pen' });

    expect(res.headers['x-request-id']).toMatch(/^req-\d+-[0-9a-f]{12}$/);
  });
});
