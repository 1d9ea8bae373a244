import { Router } from 'express';
import { z } from 'zod';
import { supabase } from '../supabase.js';
import { authenticate } from '../middleware/authenticate.js';
import { adminOnly, adminOrCoach } from '../middleware/requireRole.js';
import { toSuitModelResponse, toSwimmerSuitWithModel } from '../domain/suits.js';
import { todayIsoDate } from '../domain/swimmers.js';
import { findSuitModel, requireSuitModel, requireSwimmer, requireSwimmerSuit } from '../repositories/lookups.js';
import { HttpError } from '../utils/errors.js';
import {
  ensureOk,
  ensureRows,
  escapeLikePattern,
  handleSupabaseSingle,
  isForeignKeyViolation,
  isUniqueViolation,
} from '../utils/supabase.js';
import { booleanQuery, idParam, isoDate, limitQuery } from '../utils/query.js';
import { logger } from '../logger.js';
import {
  GENDERS,
  SUIT_CONDITIONS,
  SUIT_TYPES,
  type SuitModelRow,
  type SwimmerSuitRow,
} from '../types.js';

const suitModelSchema = z.object({
  brand: z.string().trim().min(1).max(100),
  model_name: z.string().trim().min(1).max(100),
  suit_type: z.enum(SUIT_TYPES),
  is_tech_suit: z.boolean(),
  gender: z.enum(GENDERS),
  release_year: z.number().int().min(1970).max(2100).nullable().optional(),
  msrp_cents: z.number().int().min(0).nullable().optional(),
  expected_races_peak: z.number().int().positive().optional(),
  expected_races_total: z.number().int().positive().optional(),
  fina_approved: z.boolean().optional(),
  notes: z.string().max(1000).nullable().optional(),
});

const updateSuitModelSchema = suitModelSchema.partial();

const listModelsSchema = z.object({
  brand: z.string().optional(),
  suit_type: z.enum(SUIT_TYPES).optional(),
  gender: z.enum(GENDERS).optional(),
  tech_only: booleanQuery(false),
});

const swimmerSuitSchema = z.object({
  swimmer_id: idParam,
  suit_model_id: idParam,
  nickname: z.string().trim().max(100).nullable().optional(),
  size: z.string().trim().max(20).nullable().optional(),
  color: z.string().trim().max(50).nullable().optional(),
  purchase_date: isoDate.nullable().optional(),
  purchase_price_cents: z.number().int().min(0).nullable().optional(),
  purchase_location: z.string().trim().max(200).nullable().optional(),
});

const updateSwimmerSuitSchema = swimmerSuitSchema
  .omit({ swimmer_id: true, suit_model_id: true })
  .extend({
    wear_count: z.number().int().min(0).optional(),
    race_count: z.number().int().min(0).optional(),
    condition: z.enum(SUIT_CONDITIONS).optional(),
  })
  .partial();

const listInventorySchema = z.object({
  swimmer_id: z.string().optional(),
  active_only: booleanQuery(true),
  limit: limitQuery,
});

const retireSchema = z.object({
  retirement_reason: z.string().trim().max(500).nullable().optional(),
  retired_date: isoDate.optional(),
});

function duplicateModel(model: Pick<SuitModelRow, 'brand' | 'model_name'>) {
  return new HttpError(409, `Suit model '${model.brand} ${model.model_name}' already exists`);
}

async function withModels(suits: SwimmerSuitRow[]) {
  const modelIds = Array.from(new Set(suits.map((suit) => suit.suit_model_id)));
  const models =
    modelIds.length === 0
      ? []
      : ensureRows<SuitModelRow>(
          await supabase.from('suit_models').select('*').in('id', modelIds),
          'Failed to load suit models',
        );
  const byId = new Map(models.map((model) => [model.id, model]));
  return suits.map((suit) => toSwimmerSuitWithModel(suit, byId.get(suit.suit_model_id) ?? null));
}

const router = Router();

router.use(authenticate);

router.get('/models', async (req, res, next) => {
  try {
    const filters = listModelsSchema.parse(req.query);

    let query = supabase.from('suit_models').select('*');
    if (filters.brand) query = query.ilike('brand', escapeLikePattern(filters.brand));
    if (filters.suit_type) query = query.eq('suit_type', filters.suit_type);
    if (filters.gender) query = query.eq('gender', filters.gender);
    if (filters.tech_only) query = query.eq('is_tech_suit', true);

    const models = ensureRows<SuitModelRow>(
      await query.order('brand', { ascending: true }).order('model_name', { ascending: true }),
      'Failed to load suit models',
    );
    res.json(models.map(toSuitModelResponse));
  } catch (error) {
    next(error);
  }
});

router.get('/models/:modelId', async (req, res, next) => {
  try {
    const model = await requireSuitModel(idParam.parse(req.params.modelId));
    res.json(toSuitModelResponse(model));
  } catch (error) {
    next(error);
  }
});

router.post('/models', adminOnly, async (req, res, next) => {
  try {
    const payload = suitModelSchema.parse(req.body ?? {});

    const insert = await supabase
      .from('suit_models')
      .insert({
        brand: payload.brand,
        model_name: payload.model_name,
        suit_type: payload.suit_type,
        is_tech_suit: payload.is_tech_suit,
        gender: payload.gender,
        release_year: payload.release_year ?? null,
        msrp_cents: payload.msrp_cents ?? null,
        expected_races_peak: payload.expected_races_peak ?? 10,
        expected_races_total: payload.expected_races_total ?? 30,
        fina_approved: payload.fina_approved ?? true,
        notes: payload.notes ?? null,
      })
      .select('*')
      .maybeSingle();

    if (isUniqueViolation(insert.error)) {
      throw duplicateModel(payload);
    }
    const model = handleSupabaseSingle<SuitModelRow>(insert, 'Failed to create suit model');

    logger.info('suit_model_created', { suitModelId: model.id, brand: model.brand, modelName: model.model_name });
    res.status(201).json(toSuitModelResponse(model));
  } catch (error) {
    next(error);
  }
});

router.patch('/models/:modelId', adminOnly, async (req, res, next) => {
  try {
    const modelId = idParam.parse(req.params.modelId);
    const existing = await requireSuitModel(modelId);
    const updates = updateSuitModelSchema.parse(req.body ?? {});

    if (Object.keys(updates).length === 0) {
      res.json(toSuitModelResponse(existing));
      return;
    }

    const update = await supabase.from('suit_models').update(updates).eq('id', modelId).select('*').maybeSingle();
    if (isUniqueViolation(update.error)) {
      throw duplicateModel({ brand: updates.brand ?? existing.brand, model_name: updates.model_name ?? existing.model_name });
    }
    const model = handleSupabaseSingle<SuitModelRow>(update, 'Failed to update suit model');

    logger.info('suit_model_updated', { suitModelId: modelId, fields: Object.keys(updates) });
    res.json(toSuitModelResponse(model));
  } catch (error) {
    next(error);
  }
});

router.delete('/models/:modelId', adminOnly, async (req, res, next) => {
  try {
    const modelId = idParam.parse(req.params.modelId);
    await requireSuitModel(modelId);

    const removal = await supabase.from('suit_models').delete().eq('id', modelId);
    if (isForeignKeyViolation(removal.error)) {
      throw new HttpError(409, 'Suit model is in use by swimmer inventory');
    }
    ensureOk(removal, 'Failed to delete suit model');

    logger.info('suit_model_deleted', { suitModelId: modelId });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

router.get('/inventory', async (req, res, next) => {
  try {
    const filters = listInventorySchema.parse(req.query);

    let query = supabase.from('swimmer_suits').select('*');
    if (filters.swimmer_id) query = query.eq('swimmer_id', filters.swimmer_id);
    if (filters.active_only) query = query.neq('condition', 'retired');

    const suits = ensureRows<SwimmerSuitRow>(
      await query.order('purchase_date', { ascending: false }).limit(filters.limit),
      'Failed to load suits',
    );
    res.json(await withModels(suits));
  } catch (error) {
    next(error);
  }
});

router.get('/inventory/:suitId', async (req, res, next) => {
  try {
    const suit = await requireSwimmerSuit(idParam.parse(req.params.suitId));
    const [response] = await withModels([suit]);
    res.json(response);
  } catch (error) {
    next(error);
  }
});

router.post('/inventory', adminOrCoach, async (req, res, next) => {
  try {
    const payload = swimmerSuitSchema.parse(req.body ?? {});
    await requireSwimmer(payload.swimmer_id);
    const model = await requireSuitModel(payload.suit_model_id);

    const suit = handleSupabaseSingle<SwimmerSuitRow>(
      await supabase
        .from('swimmer_suits')
        .insert({
          swimmer_id: payload.swimmer_id,
          suit_model_id: model.id,
          nickname: payload.nickname ?? null,
          size: payload.size ?? null,
          color: payload.color ?? null,
          purchase_date: payload.purchase_date ?? null,
          purchase_price_cents: payload.purchase_price_cents ?? null,
          purchase_location: payload.purchase_location ?? null,
          wear_count: 0,
          race_count: 0,
          condition: 'new',
        })
        .select('*')
        .maybeSingle(),
      'Failed to add suit',
    );

    logger.info('suit_added', { suitId: suit.id, swimmerId: suit.swimmer_id, suitModelId: model.id });
    res.status(201).json(toSwimmerSuitWithModel(suit, model));
  } catch (error) {
    next(error);
  }
});

router.patch('/inventory/:suitId', adminOrCoach, async (req, res, next) => {
  try {
    const suitId = idParam.parse(req.params.suitId);
    const existing = await requireSwimmerSuit(suitId);
    const updates = updateSwimmerSuitSchema.parse(req.body ?? {});

    const suit =
      Object.keys(updates).length === 0
        ? existing
        : handleSupabaseSingle<SwimmerSuitRow>(
            await supabase.from('swimmer_suits').update(updates).eq('id', suitId).select('*').maybeSingle(),
            'Failed to update suit',
          );

    logger.info('suit_updated', { suitId, fields: Object.keys(updates) });
    res.json(toSwimmerSuitWithModel(suit, await findSuitModel(suit.suit_model_id)));
  } catch (error) {
    next(error);
  }
});

router.post('/inventory/:suitId/retire', adminOrCoach, async (req, res, next) => {
  try {
    const suitId = idParam.parse(req.params.suitId);
    const existing = await requireSwimmerSuit(suitId);
    const payload = retireSchema.parse(req.body ?? {});

    if (existing.condition === 'retired') {
      throw new HttpError(400, 'Suit is already retired');
    }

    const suit = handleSupabaseSingle<SwimmerSuitRow>(
      await supabase
        .from('swimmer_suits')
        .update({
          condition: 'retired',
          retired_date: payload.retired_date ?? todayIsoDate(),
          retirement_reason: payload.retirement_reason ?? null,
        })
        .eq('id', suitId)
        .select('*')
        .maybeSingle(),
      'Failed to retire suit',
    );

    logger.info('suit_retired', { suitId, raceCount: suit.race_count });
    res.json(toSwimmerSuitWithModel(suit, await findSuitModel(suit.suit_model_id)));
  } catch (error) {
    next(error);
  }
});

router.delete('/inventory/:suitId', adminOnly, async (req, res, next) => {
  try {
    const suitId = idParam.parse(req.params.suitId);
    await requireSwimmerSuit(suitId);

    ensureOk(await supabase.from('swimmer_suits').delete().eq('id', suitId), 'Failed to delete suit');

    logger.info('suit_deleted', { suitId });
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

export default router;
