import { createModuleLogger } from "@/shared/config/logger";
import { ConflictError, fail, OperationResult, succeed } from "@/shared/types/common.types";
import { generatePassword, generateUsername } from "@/shared/utils/crypto";
import type { AuthApiClient } from "@/domains/identity/services/auth-api.client";
import type { EmailService } from "@/domains/notifications/services/email.service";
import type { Customer, CustomerInput, CustomerPage } from "../models/customer.model";
import type { CustomerRepository } from "../repositories/customer.repository";

const moduleLogger = createModuleLogger("CustomerService");

const CUSTOMER_ROLE = "Customer";

const splitName = (name: string): { firstName: string; lastName: string } => {
  const [firstName = name, lastName = ""] = name.trim().split(/\s+/);
  return { firstName, lastName };
};

const isBlank = (value: string | undefined): boolean => !value || value.trim() === "";

export class CustomerService {
  constructor(
    private readonly customerRepository: CustomerRepository,
    private readonly authApiClient: AuthApiClient,
    private readonly emailService: EmailService,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Provisions an auth-service account, then stores the customer. When the store rejects the
   * customer the freshly created account is deleted again.
   */
  async createCustomerWithAuth(input: CustomerInput): Promise<OperationResult<Customer>> {
    if (isBlank(input.name) || isBlank(input.email) || isBlank(input.phone)) {
      return fail("VALIDATION_ERROR", "Name, email and phone are required.");
    }

    if (await this.authApiClient.userExistsByEmail(input.email)) {
      return fail("CONFLICT", "A user with this email already exists in the system.");
    }

    if (await this.customerRepository.findByEmail(input.email)) {
      return fail("CONFLICT", "A customer with this email already exists.");
    }

    const password = generatePassword();
    const username = generateUsername(input.email);

    const userCreated = await this.authApiClient.createUser({
      username,
      email: input.email,
      password,
      role: CUSTOMER_ROLE,
      ...splitName(input.name),
    });
    if (!userCreated) {
      return fail("UPSTREAM_ERROR", "Failed to create user account.");
    }

    let customer: Customer;
    try {
      customer = await this.customerRepository.create({
        name: input.name.trim(),
        email: input.email.trim(),
        phone: input.phone.trim(),
        dateOfBirth: input.dateOfBirth ?? null,
        address: input.address?.trim() ?? "",
        userId: null,
        isActive: input.isActive ?? true,
      });
    } catch (error) {
      moduleLogger.error({ err: error, email: input.email }, "Customer persistence failed, removing auth user");
      await this.authApiClient.deleteUserByEmail(input.email);

      const reason = error instanceof Error ? error.message : String(error);
      return fail(error instanceof ConflictError ? "CONFLICT" : "OPERATION_FAILED", `Failed to create customer: ${reason}`);
    }

    try {
      const sent = await this.emailService.sendWelcomeEmail(customer.email, customer.name, username, password, CUSTOMER_ROLE);
      if (!sent) {
        moduleLogger.warn({ customerId: customer.id }, "Welcome email was not sent");
      }
    } catch (error) {
      moduleLogger.warn({ err: error, customerId: customer.id }, "Welcome email was not sent");
    }

    moduleLogger.info({ customerId: customer.id }, "Customer created successfully");
    return succeed("Customer created successfully.", customer);
  }

  async getCustomerById(id: number): Promise<Customer | null> {
    return this.customerRepository.findById(id);
  }

  async getCustomers(page: number, pageSize: number, search?: string): Promise<CustomerPage> {
    return this.customerRepository.findAll({ page, pageSize, search });
  }

  async updateCustomer(id: number, input: CustomerInput): Promise<OperationResult<Customer>> {
    if (id <= 0) {
      return fail("VALIDATION_ERROR", "Invalid customer ID.");
    }

    const existing = await this.customerRepository.findById(id);
    if (!existing) {
      return fail("NOT_FOUND", "Customer not found.");
    }

    try {
      const customer = await this.customerRepository.update({
        ...existing,
        name: input.name.trim(),
        email: input.email.trim(),
        phone: input.phone.trim(),
        dateOfBirth: input.dateOfBirth === undefined ? existing.dateOfBirth : input.dateOfBirth,
        address: input.address?.trim() ?? existing.address,
        isActive: input.isActive ?? existing.isActive,
        updatedAt: this.now(),
      });

      moduleLogger.info({ customerId: id }, "Customer updated successfully");
      return succeed("Customer updated successfully.", customer);
    } catch (error) {
      if (error instanceof ConflictError) {
        return fail("CONFLICT", error.message);
      }
      throw error;
    }
  }

  async deleteCustomerWithAuth(id: number): Promise<OperationResult<null>> {
    const customer = await this.customerRepository.findById(id);
    if (!customer) {
      return fail("NOT_FOUND", "Customer not found.");
    }

    if (!(await this.customerRepository.delete(id))) {
      return fail("OPERATION_FAILED", "Failed to delete customer.");
    }

    if (!(await this.authApiClient.deleteUserByEmail(customer.email))) {
      moduleLogger.warn({ customerId: id, email: customer.email }, "Auth user could not be deleted");
    }

    moduleLogger.info({ customerId: id }, "Customer deleted successfully");
    return succeed("Customer deleted successfully.", null);
  }
}
