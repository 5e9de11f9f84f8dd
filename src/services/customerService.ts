/**
 * Customer Service
 */

import {
  RecordId,
  Customer,
  CustomerUpdate,
  DeleteOutcome,
  EntityErrorCode,
  Result,
  customerSchema,
  customerUpdateSchema
} from '../types';
import { CustomerStore } from '../data/store';
import logger from '../utils/logger';
import { failure, success, invalidRecord } from './results';

export class CustomerService {
  constructor(private readonly customers: CustomerStore) {}

  createCustomer(input: Customer): Result<Customer> {
    const parsed = customerSchema.safeParse(input);
    if (!parsed.success) {
      return invalidRecord(parsed.error);
    }

    const created = this.customers.create(parsed.data);
    if (!created) {
      return failure(
        EntityErrorCode.DUPLICATE_KEY,
        `Customer ID already exists: ${parsed.data.customer_id}`,
        { customer_id: parsed.data.customer_id }
      );
    }

    logger.info('Customer created', { customer_id: created.customer_id });
    return success(created);
  }

  deleteCustomer(customerId: RecordId): Result<DeleteOutcome> {
    const removed = this.customers.delete(customerId);
    logger.info(removed ? 'Customer deleted' : 'No customer to delete', { customer_id: customerId });
    return success({ removed });
  }

  displayCustomer(customerId: RecordId): Result<Customer> {
    const customer = this.customers.getById(customerId);
    if (!customer) {
      return failure(EntityErrorCode.NOT_FOUND, `Customer not found: ${customerId}`, {
        customer_id: customerId
      });
    }
    return success(customer);
  }

  // Rewrites the document on a miss too
  modifyCustomer(customerId: RecordId, updates: CustomerUpdate): Result<Customer> {
    const parsed = customerUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      return invalidRecord(parsed.error);
    }

    const updated = this.customers.update(customerId, parsed.data);
    if (!updated) {
      return failure(EntityErrorCode.NOT_FOUND, `Customer not found: ${customerId}`, {
        customer_id: customerId
      });
    }

    logger.info('Customer modified', { customer_id: customerId, fields: Object.keys(parsed.data) });
    return success(updated);
  }

  listCustomers(): Customer[] {
    return this.customers.getAll();
  }
}
