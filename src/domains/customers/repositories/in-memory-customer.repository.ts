import { ConflictError, NotFoundError } from "@/shared/types/common.types";
import {
  CreateCustomerData,
  Customer,
  CustomerListOptions,
  CustomerPage,
  cloneCustomer,
} from "../models/customer.model";
import type { CustomerRepository } from "./customer.repository";

const matchesSearch = (customer: Customer, search: string): boolean => {
  const term = search.toLowerCase();
  return (
    customer.name.toLowerCase().includes(term) ||
    customer.email.toLowerCase().includes(term) ||
    (customer.phone !== "" && customer.phone.toLowerCase().includes(term))
  );
};

export class InMemoryCustomerRepository implements CustomerRepository {
  private readonly customers = new Map<number, Customer>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async create(data: CreateCustomerData): Promise<Customer> {
    this.assertEmailFree(data.email);

    const timestamp = this.now();
    const customer: Customer = { ...data, id: this.nextId++, createdAt: timestamp, updatedAt: timestamp };
    this.customers.set(customer.id, cloneCustomer(customer));

    return cloneCustomer(customer);
  }

  async findById(id: number): Promise<Customer | null> {
    const customer = this.customers.get(id);
    return customer ? cloneCustomer(customer) : null;
  }

  async findByEmail(email: string): Promise<Customer | null> {
    const customer = this.findEmail(email);
    return customer ? cloneCustomer(customer) : null;
  }

  async findAll(options: CustomerListOptions): Promise<CustomerPage> {
    const search = options.search?.trim();
    const matching = Array.from(this.customers.values())
      .filter((customer) => !search || matchesSearch(customer, search))
      .sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id);

    const offset = (options.page - 1) * options.pageSize;

    return {
      customers: matching.slice(offset, offset + options.pageSize).map(cloneCustomer),
      total: matching.length,
    };
  }

  async update(customer: Customer): Promise<Customer> {
    if (!this.customers.has(customer.id)) {
      throw new NotFoundError(`Customer with ID ${customer.id} not found`);
    }
    this.assertEmailFree(customer.email, customer.id);

    this.customers.set(customer.id, cloneCustomer(customer));
    return cloneCustomer(customer);
  }

  async setUserId(id: number, userId: number): Promise<boolean> {
    const customer = this.customers.get(id);
    if (!customer) {
      return false;
    }
    customer.userId = userId;
    customer.updatedAt = this.now();
    return true;
  }

  async delete(id: number): Promise<boolean> {
    return this.customers.delete(id);
  }

  private findEmail(email: string): Customer | undefined {
    const normalized = email.toLowerCase();
    return Array.from(this.customers.values()).find((customer) => customer.email.toLowerCase() === normalized);
  }

  private assertEmailFree(email: string, ownId?: number): void {
    const existing = this.findEmail(email);
    if (existing && existing.id !== ownId) {
      throw new ConflictError("A customer with this email already exists.");
    }
  }
}
