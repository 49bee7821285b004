// =============================================================
// File: server/services/doc-template.service.ts
// Module: Cabinet — document templates (statuts, PV, ...)
// Description: Template CRUD and placeholder rendering.
//   {{NOM}}, {{GERANT}}, {{DATE}}, {{TYPE_JURIDIQUE}} and {{RC}}
//   are replaced with HTML-escaped values; any other {{...}} is
//   left untouched.
// =============================================================

import { TEMPLATE_PLACEHOLDERS } from '../../shared/constants';
import { DocTemplate, RenderedTemplate } from '../../shared/types';
import { DocTemplateRow } from '../database/rows';
import { toTimestamp } from '../database/values';
import { NotFoundError } from '../errors';
import { parseInput } from '../schemas/common';
import { RenderQuerySchema, TemplateInputSchema, UpdateTemplateSchema } from '../schemas/cabinet.schema';
import { BaseService } from './base.service';
import { societeService } from './societe.service';

export type TemplateContext = Record<(typeof TEMPLATE_PLACEHOLDERS)[number], string>;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function isPlaceholder(key: string): key is keyof TemplateContext {
  return TEMPLATE_PLACEHOLDERS.some((p) => p === key);
}

export function renderContent(content: string, context: TemplateContext): string {
  return content.replace(/\{\{\s*([A-Z_]+)\s*\}\}/g, (match, key: string) =>
    isPlaceholder(key) ? escapeHtml(context[key]) : match,
  );
}

function mapTemplate(row: DocTemplateRow): DocTemplate {
  return {
    id: row.id,
    title: row.title,
    type: row.type,
    content: row.content,
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

class DocTemplateService extends BaseService<DocTemplateRow> {
  constructor() {
    super('doc_templates');
  }

  async listTemplates(): Promise<DocTemplate[]> {
    const rows = await this.listRows('created_at', 'desc');
    return rows.map(mapTemplate);
  }

  async getTemplate(id: number): Promise<DocTemplate> {
    const row = await this.findRow(id);
    if (!row) throw new NotFoundError('Template', id);
    return mapTemplate(row);
  }

  async createTemplate(input: unknown): Promise<DocTemplate> {
    const data = parseInput(TemplateInputSchema, input);
    const row = await this.insertRow(data);
    return mapTemplate(row);
  }

  async updateTemplate(id: number, input: unknown): Promise<DocTemplate> {
    const data = parseInput(UpdateTemplateSchema, input);
    const existing = await this.getTemplate(id);

    const row = await this.updateRow(id, {
      title: data.title ?? existing.title,
      type: data.type ?? existing.type,
      content: data.content ?? existing.content,
    });
    if (!row) throw new NotFoundError('Template', id);
    return mapTemplate(row);
  }

  async deleteTemplate(id: number): Promise<void> {
    await this.getTemplate(id);
    await this.deleteRow(id);
  }

  // ──────── RENDER ────────

  async renderTemplate(id: number, query: unknown = {}): Promise<RenderedTemplate> {
    const { societe_id, date } = parseInput(RenderQuerySchema, query);
    const template = await this.getTemplate(id);
    const societe = societe_id === undefined ? null : await societeService.getSocieteRow(societe_id);

    const context: TemplateContext = {
      NOM: societe?.name ?? '',
      GERANT: societe?.gerant ?? '',
      DATE: date ?? '',
      TYPE_JURIDIQUE: societe?.type_juridique ?? '',
      RC: societe?.rc ?? '',
    };

    return {
      title: template.title,
      type: template.type,
      filename: `${template.type}-${template.id}.html`,
      content: renderContent(template.content, context),
    };
  }
}

export const docTemplateService = new DocTemplateService();
