// =============================================================
// File: server/services/customer.service.ts
// Module: Invoicing — customers
// =============================================================

import { Customer } from '../../shared/types';
import { CustomerRow } from '../database/rows';
import { toTimestamp } from '../database/values';
import { NotFoundError } from '../errors';
import { parseInput } from '../schemas/common';
import {
  CustomerInput,
  CustomerInputSchema,
  UpdateCustomerInput,
  UpdateCustomerSchema,
} from '../schemas/invoicing.schema';
import { BaseService, Executor } from './base.service';

function mapCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    name: row.name,
    vat_id: row.vat_id,
    address: row.address,
    created_at: toTimestamp(row.created_at),
    updated_at: toTimestamp(row.updated_at),
  };
}

class CustomerService extends BaseService<CustomerRow> {
  constructor() {
    super('customers');
  }

  async listCustomers(): Promise<Customer[]> {
    const rows: CustomerRow[] = await this.db('customers').orderBy('name', 'asc');
    return rows.map(mapCustomer);
  }

  async getCustomer(id: number, executor: Executor = this.db): Promise<Customer> {
    const row = await this.findRow(id, executor);
    if (!row) throw new NotFoundError('Customer', id);
    return mapCustomer(row);
  }

  async createCustomer(input: unknown): Promise<Customer> {
    const data: CustomerInput = parseInput(CustomerInputSchema, input);
    const row = await this.insertRow(data);
    return mapCustomer(row);
  }

  async updateCustomer(id: number, input: unknown): Promise<Customer> {
    const data: UpdateCustomerInput = parseInput(UpdateCustomerSchema, input);
    await this.getCustomer(id);

    const changes: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (value !== undefined) changes[key] = value;
    }

    const row = await this.updateRow(id, changes);
    if (!row) throw new NotFoundError('Customer', id);
    return mapCustomer(row);
  }
}

export const customerService = new CustomerService();
