// =============================================================
// File: server/services/cabinet.service.ts
// Module: Cabinet — accounting firms
// Description: A cabinet owns sociétés. Deleting a cabinet
//   removes its sociétés together with their associates and
//   cessions, in one transaction.
// =============================================================

import { Cabinet } from '../../shared/types';
import { CabinetRow } from '../database/rows';
import { toTimestamp } from '../database/values';
import { NotFoundError } from '../errors';
import { parseInput } from '../schemas/common';
import { CabinetInputSchema } from '../schemas/cabinet.schema';
import { BaseService, Executor } from './base.service';

function mapCabinet(row: CabinetRow): Cabinet {
  return {
    id: row.id,
    name: row.name,
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

class CabinetService extends BaseService<CabinetRow> {
  constructor() {
    super('cabinets');
  }

  async listCabinets(): Promise<Cabinet[]> {
    const rows = await this.listRows('created_at', 'desc');
    return rows.map(mapCabinet);
  }

  async getCabinet(id: number, executor: Executor = this.db): Promise<Cabinet> {
    const row = await this.findRow(id, executor);
    if (!row) throw new NotFoundError('Cabinet', id);
    return mapCabinet(row);
  }

  async createCabinet(input: unknown): Promise<Cabinet> {
    const data = parseInput(CabinetInputSchema, input);
    const row = await this.insertRow(data, { entity: 'Cabinet', field: 'name' });
    return mapCabinet(row);
  }

  async deleteCabinet(id: number): Promise<void> {
    await this.getCabinet(id);

    await this.db.transaction(async (trx) => {
      const societeIds = trx('societes').where({ cabinet_id: id }).select('id');
      await trx('cessions').whereIn('societe_id', societeIds).del();
      await trx('associates').whereIn('societe_id', societeIds).del();
      await trx('societes').where({ cabinet_id: id }).del();
      await this.deleteRow(id, trx);
    });
  }
}

export const cabinetService = new CabinetService();
