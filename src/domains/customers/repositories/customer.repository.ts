import type { CreateCustomerData, Customer, CustomerListOptions, CustomerPage } from "../models/customer.model";

export interface CustomerRepository {
  /** @throws ConflictError when the email is already taken */
  create(data: CreateCustomerData): Promise<Customer>;
  findById(id: number): Promise<Customer | null>;
  findByEmail(email: string): Promise<Customer | null>;
  /** Ordered by name; `search` matches name, email or phone, ignoring case. */
  findAll(options: CustomerListOptions): Promise<CustomerPage>;
  /** @throws NotFoundError for an unknown id, ConflictError when the email is already taken */
  update(customer: Customer): Promise<Customer>;
  setUserId(id: number, userId: number): Promise<boolean>;
  delete(id: number): Promise<boolean>;
}
