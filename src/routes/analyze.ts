import express from 'express';
import type { Response } from 'express';
import { z } from 'zod';
import { createLogger, errorMessage } from '../lib/logger.js';
import type { Engine } from '../lib/pricing/analysis-pipeline.js';
import { AnalysisCancelledError } from '../lib/pricing/cancellation.js';
import { EXACT_LABEL_CONFIDENCE, assessCondition } from '../lib/pricing/condition-assessor.js';
import { getConditionGrade } from '../lib/pricing/condition-grades.js';
import { CONDITION_GRADE_IDS, ITEM_CATEGORIES } from '../lib/pricing/types.js';
import type { ConditionAssessment, Identification } from '../lib/pricing/types.js';

const log = createLogger('api');

const AnalyzeBody = z.object({
  images: z.array(z.string()).max(12).optional(),
  barcode: z.string().optional(),
  texts: z.array(z.string()).max(50).optional(),
  categoryHint: z.string().optional(),
  conditionNotes: z.string().optional(),
});

const IdentificationBody = z.object({
  productName: z.string().default(''),
  brand: z.string().default(''),
  productLine: z.string().default(''),
  variant: z.string().default(''),
  styleCode: z.string().default(''),
  colorway: z.string().default(''),
  size: z.string().default(''),
  category: z.enum(ITEM_CATEGORIES).default('other'),
  method: z.enum(['visual-and-text', 'visual-only', 'text-only', 'category-based']).default('text-only'),
  confidence: z.number().min(0).max(1).default(0),
  upc: z.string().nullable().default(null),
});

const ConditionBody = z
  .object({
    grade: z.enum(CONDITION_GRADE_IDS).optional(),
    narrative: z.string().optional(),
    confidence: z.number().min(0).max(1).optional(),
  })
  .refine((value) => value.grade !== undefined || (value.narrative ?? '').trim() !== '', {
    message: 'condition needs a grade or a narrative',
  });

const PriceBody = z.object({
  identification: IdentificationBody,
  condition: ConditionBody,
});

const ProspectBody = PriceBody.extend({
  askingPrice: z.number().positive().optional(),
});

type ConditionBody = z.infer<typeof ConditionBody>;

function toConditionAssessment(body: ConditionBody): ConditionAssessment {
  if (body.grade) {
    return Object.freeze({
      grade: getConditionGrade(body.grade),
      confidence: body.confidence ?? EXACT_LABEL_CONFIDENCE,
      factors: Object.freeze([]),
      matchedPhrase: null,
    });
  }
  const assessed = assessCondition(body.narrative);
  return body.confidence === undefined ? assessed : Object.freeze({ ...assessed, confidence: body.confidence });
}

/** Abort the analysis when the client goes away before we answer. */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller;
}

function handleError(res: Response, err: unknown, route: string): void {
  if (err instanceof AnalysisCancelledError) {
    log.info(`${route} cancelled by client`);
    if (!res.headersSent) res.status(499).json({ error: err.message });
    return;
  }
  log.error(`${route} failed`, { error: errorMessage(err) });
  res.status(500).json({ error: errorMessage(err) });
}

export function createAnalyzeRouter(engine: Engine): express.Router {
  const router = express.Router();

  // Full pipeline: photos and/or barcode → identification, condition, price
  router.post('/analyze', async (req, res) => {
    const parsed = AnalyzeBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
      return;
    }

    try {
      const controller = abortOnDisconnect(res);
      const result = await engine.analyze(parsed.data, { signal: controller.signal });
      if (!result.ok) {
        res.status(400).json({ error: result.error, identification: result.identification });
        return;
      }
      res.json(result);
    } catch (err) {
      handleError(res, err, 'analyze');
    }
  });

  // Price an item the caller already identified and graded
  router.post('/price', async (req, res) => {
    const parsed = PriceBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
      return;
    }

    try {
      const identification: Identification = Object.freeze({ ...parsed.data.identification });
      const condition = toConditionAssessment(parsed.data.condition);
      const controller = abortOnDisconnect(res);
      const priced = await engine.price(identification, condition, { signal: controller.signal });
      res.json({ identification, condition, ...priced });
    } catch (err) {
      handleError(res, err, 'price');
    }
  });

  // Buy-side view for sourcing: max and target buy price, profit, ROI and a verdict
  router.post('/prospect', async (req, res) => {
    const parsed = ProspectBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues });
      return;
    }

    try {
      const identification: Identification = Object.freeze({ ...parsed.data.identification });
      const condition = toConditionAssessment(parsed.data.condition);
      const controller = abortOnDisconnect(res);
      const prospected = await engine.prospect(identification, condition, {
        signal: controller.signal,
        askingPrice: parsed.data.askingPrice,
      });
      res.json({ identification, condition, ...prospected });
    } catch (err) {
      handleError(res, err, 'prospect');
    }
  });

  // Drop cached market snapshots (one key via ?key=, otherwise all)
  router.delete('/market-cache', (req, res) => {
    const key = typeof req.query.key === 'string' && req.query.key ? req.query.key : undefined;
    const removed = engine.market.invalidate(key);
    log.info(`Market cache invalidated`, { key: key ?? '*', removed });
    res.json({ ok: true, removed });
  });

  return router;
}
