// =============================================================
// File: server/services/cession.service.ts
// Module: Cabinet — cessions (share transfers)
// Description: Records a transfer of parts between two
//   associates and updates the société's current distribution.
//
//   The cedant's count is floored at zero: transferring more
//   parts than the cedant holds is absorbed, and the absorbed
//   amount is reported as `shortfall`. Strict mode
//   (CESSION_STRICT or `strict: true`) rejects such a transfer
//   with INSUFFICIENT_PARTS instead.
// =============================================================

import { RECENT_CESSIONS_LIMIT } from '../../shared/constants';
import { Associate, Cession } from '../../shared/types';
import { getConfig } from '../config';
import { CessionRow } from '../database/rows';
import { parseAmount, parseIsoDate, toIsoDate, toNullableNum, toTimestamp, todayIso } from '../database/values';
import { InsufficientPartsError, ValidationError } from '../errors';
import { parseInput } from '../schemas/common';
import { CessionInput, CessionInputSchema } from '../schemas/cabinet.schema';
import { BaseService } from './base.service';
import { societeService } from './societe.service';

// ────────────────────────────────────────────────────────────
// Distribution update
// ────────────────────────────────────────────────────────────

export interface DistributionUpdate {
  associates: Associate[];
  shortfall: number;
}

/**
 * Applies a transfer of `parts` from `cedant` to `cessionnaire` to a copy
 * of `associates`. Unknown names are appended with 0 parts, cedant first.
 * `parts <= 0` leaves the distribution unchanged.
 */
export function applyCessionToDistribution(
  associates: Associate[],
  cedant: string,
  cessionnaire: string,
  parts: number,
  options: { strict?: boolean } = {},
): DistributionUpdate {
  const next = associates.map((a) => ({ ...a }));
  if (parts <= 0) return { associates: next, shortfall: 0 };

  const findOrAdd = (name: string): Associate => {
    const found = next.find((a) => a.name === name);
    if (found) return found;
    const created: Associate = { name, address: null, parts_count: 0 };
    next.push(created);
    return created;
  };

  const from = findOrAdd(cedant);
  const to = findOrAdd(cessionnaire);

  const held = from.parts_count;
  const shortfall = Math.max(0, parts - held);
  if (shortfall > 0 && options.strict) {
    throw new InsufficientPartsError(cedant, held, parts);
  }

  from.parts_count = Math.max(0, held - parts);
  to.parts_count += parts;
  return { associates: next, shortfall };
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

export interface CessionResult {
  cession: Cession;
  associates: Associate[];
  shortfall: number;
}

function mapCession(row: CessionRow): Cession {
  return {
    id: row.id,
    societe_id: row.societe_id,
    societe_name: row.societe_name,
    cession_date: toIsoDate(row.cession_date),
    cedant: row.cedant,
    cedant_address: row.cedant_address,
    cessionnaire: row.cessionnaire,
    cessionnaire_address: row.cessionnaire_address,
    parts_count: Number(row.parts_count),
    price: toNullableNum(row.price),
    payment_mode: row.payment_mode,
    conditions: row.conditions,
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

class CessionService extends BaseService<CessionRow> {
  constructor() {
    super('cessions');
  }

  async createCession(input: unknown): Promise<CessionResult> {
    const data: CessionInput = parseInput(CessionInputSchema, input);
    const cessionDate = data.cession_date ? parseIsoDate(data.cession_date, 'cession_date') : todayIso();
    const strict = data.strict ?? getConfig().CESSION_STRICT;

    const price = data.price === null || data.price === undefined || data.price === ''
      ? null
      : parseAmount(data.price, 'price', 13);
    if (price !== null && price < 0) throw new ValidationError('price cannot be negative', { field: 'price' });

    await societeService.getSocieteRow(data.societe_id);

    return await this.db.transaction(async (trx) => {
      const current = await societeService.listAssociates(data.societe_id, trx);
      const update = applyCessionToDistribution(current, data.cedant, data.cessionnaire, data.parts_count, {
        strict,
      });

      const [row]: CessionRow[] = await trx('cessions')
        .insert({
          societe_id: data.societe_id,
          cession_date: cessionDate,
          cedant: data.cedant,
          cedant_address: data.cedant_address,
          cessionnaire: data.cessionnaire,
          cessionnaire_address: data.cessionnaire_address,
          parts_count: data.parts_count,
          price,
          payment_mode: data.payment_mode,
          conditions: data.conditions,
        })
        .returning('*');

      const before = new Map(current.map((a): [number | undefined, number] => [a.id, a.parts_count]));
      for (const associate of update.associates) {
        if (associate.id === undefined) {
          const address = associate.name === data.cedant ? data.cedant_address : data.cessionnaire_address;
          await trx('associates').insert({
            societe_id: data.societe_id,
            name: associate.name,
            address,
            parts_count: associate.parts_count,
          });
        } else if (before.get(associate.id) !== associate.parts_count) {
          await trx('associates')
            .where({ id: associate.id })
            .update({ parts_count: associate.parts_count, updated_at: trx.fn.now() });
        }
      }

      return {
        cession: mapCession(row),
        associates: await societeService.listAssociates(data.societe_id, trx),
        shortfall: update.shortfall,
      };
    });
  }

  // Newest first
  async listCessions(societeId?: number, limit?: number): Promise<Cession[]> {
    const query = this.db('cessions as c')
      .join('societes as s', 's.id', 'c.societe_id')
      .select('c.*', 's.name as societe_name')
      .orderBy('c.created_at', 'desc')
      .orderBy('c.id', 'desc');
    if (societeId !== undefined) query.where('c.societe_id', societeId);
    if (limit !== undefined) query.limit(limit);

    const rows: CessionRow[] = await query;
    return rows.map(mapCession);
  }

  async recentCessions(): Promise<Cession[]> {
    return await this.listCessions(undefined, RECENT_CESSIONS_LIMIT);
  }
}

export const cessionService = new CessionService();
