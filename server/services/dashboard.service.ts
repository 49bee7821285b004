import { Cession } from '../../shared/types';
import { SocieteRow } from '../database/rows';
import { BaseService } from './base.service';
import { cessionService } from './cession.service';

export interface DashboardSummary {
  societes_count: number;
  recent_cessions: Cession[];
}

export interface ChartSeries {
  labels: string[];
  values: number[];
}

interface TypeCountRow {
  type_juridique: string | null;
  count: number | string;
}

class DashboardService extends BaseService<SocieteRow> {
  constructor() {
    super('societes');
  }

  async summary(): Promise<DashboardSummary> {
    return {
      societes_count: await this.countRows(),
      recent_cessions: await cessionService.recentCessions(),
    };
  }

  // Sociétés per legal form; no legal form reads "N/A"
  async companiesByType(): Promise<ChartSeries> {
    const rows: TypeCountRow[] = await this.db('societes')
      .select('type_juridique', this.db.raw('COUNT(*) as count'))
      .groupBy('type_juridique')
      .orderBy('type_juridique', 'asc');

    return {
      labels: rows.map((r) => r.type_juridique ?? 'N/A'),
      values: rows.map((r) => Number(r.count)),
    };
  }
}

export const dashboardService = new DashboardService();
