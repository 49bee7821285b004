// =============================================================
// File: server/services/societe.service.ts
// Module: Cabinet — sociétés (client companies)
// Description:
//   - Société records, optionally attached to a cabinet
//   - Associates and the current share distribution
//     (percent = parts / total × 100, total read as 1 when 0)
//   - Flat export rows for the presentation layer
// =============================================================

import { Associate, DistributionRow, Societe, SocieteDetail } from '../../shared/types';
import { AssociateRow, SocieteRow } from '../database/rows';
import { parseAmount, toNullableNum, toTimestamp } from '../database/values';
import { NotFoundError, ValidationError } from '../errors';
import { parseInput } from '../schemas/common';
import { AssociateInput, AssociateInputSchema, SocieteInput, SocieteInputSchema } from '../schemas/cabinet.schema';
import { BaseService, Executor } from './base.service';
import { cabinetService } from './cabinet.service';

export interface SocieteExportRow {
  id: number;
  name: string;
  type_juridique: string | null;
  capital: number | null;
  gerant: string | null;
  rc: string | null;
  cabinet: string | null;
}

// ────────────────────────────────────────────────────────────
// Distribution
// ────────────────────────────────────────────────────────────

export function totalParts(associates: Associate[]): number {
  return associates.reduce((sum, a) => sum + a.parts_count, 0);
}

export function distribution(associates: Associate[]): DistributionRow[] {
  const total = totalParts(associates) || 1;
  return associates.map((a) => ({
    name: a.name,
    address: a.address,
    parts_count: a.parts_count,
    percent: (a.parts_count / total) * 100,
  }));
}

export function mapAssociate(row: AssociateRow): Associate {
  return {
    id: row.id,
    societe_id: row.societe_id,
    name: row.name,
    address: row.address,
    parts_count: Number(row.parts_count),
  };
}

function mapSociete(row: SocieteRow): Societe {
  return {
    id: row.id,
    name: row.name,
    type_juridique: row.type_juridique,
    capital: toNullableNum(row.capital),
    gerant: row.gerant,
    rc: row.rc,
    cabinet_id: row.cabinet_id,
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

// ────────────────────────────────────────────────────────────
// Service
// ────────────────────────────────────────────────────────────

class SocieteService extends BaseService<SocieteRow> {
  constructor() {
    super('societes');
  }

  async listSocietes(): Promise<Societe[]> {
    const rows = await this.listRows('created_at', 'desc');
    return rows.map(mapSociete);
  }

  async getSocieteRow(id: number, executor: Executor = this.db): Promise<SocieteRow> {
    const row: SocieteRow | undefined = await executor('societes as s')
      .leftJoin('cabinets as c', 'c.id', 's.cabinet_id')
      .where('s.id', id)
      .select('s.*', 'c.name as cabinet_name')
      .first();
    if (!row) throw new NotFoundError('Societe', id);
    return row;
  }

  async listAssociates(societeId: number, executor: Executor = this.db): Promise<Associate[]> {
    const rows: AssociateRow[] = await executor('associates').where({ societe_id: societeId }).orderBy('id', 'asc');
    return rows.map(mapAssociate);
  }

  async getSociete(id: number, executor: Executor = this.db): Promise<SocieteDetail> {
    const row = await this.getSocieteRow(id, executor);
    const associates = await this.listAssociates(id, executor);
    return {
      ...mapSociete(row),
      cabinet_name: row.cabinet_name ?? null,
      associates,
      total_parts: totalParts(associates),
      distribution: distribution(associates),
    };
  }

  async createSociete(input: unknown): Promise<Societe> {
    const data: SocieteInput = parseInput(SocieteInputSchema, input);
    const cabinetId = data.cabinet_id ?? null;
    if (cabinetId !== null) await cabinetService.getCabinet(cabinetId);

    const capital = data.capital === null || data.capital === undefined || data.capital === ''
      ? null
      : parseAmount(data.capital, 'capital', 13);
    if (capital !== null && capital < 0) {
      throw new ValidationError('capital cannot be negative', { field: 'capital' });
    }

    const row = await this.insertRow({
      name: data.name,
      type_juridique: data.type_juridique,
      capital,
      gerant: data.gerant,
      rc: data.rc,
      cabinet_id: cabinetId,
    });
    return mapSociete(row);
  }

  async addAssociate(societeId: number, input: unknown): Promise<Associate> {
    const data: AssociateInput = parseInput(AssociateInputSchema, input);
    await this.getSocieteRow(societeId);

    const [row]: AssociateRow[] = await this.db('associates')
      .insert({ ...data, societe_id: societeId })
      .returning('*');
    return mapAssociate(row);
  }

  // ──────── EXPORT ────────

  async exportRows(): Promise<SocieteExportRow[]> {
    const rows: SocieteRow[] = await this.db('societes as s')
      .leftJoin('cabinets as c', 'c.id', 's.cabinet_id')
      .select('s.*', 'c.name as cabinet_name')
      .orderBy('s.name', 'asc');

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      type_juridique: row.type_juridique,
      capital: toNullableNum(row.capital),
      gerant: row.gerant,
      rc: row.rc,
      cabinet: row.cabinet_name ?? null,
    }));
  }
}

export const societeService = new SocieteService();
