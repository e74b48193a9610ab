import { createModuleLogger } from "@/shared/config/logger";
import { fail, OperationResult, succeed } from "@/shared/types/common.types";
import type { CustomerRepository } from "@/domains/customers/repositories/customer.repository";
import type { DentistRepository } from "@/domains/dentists/repositories/dentist.repository";
import type { AuthApiClient } from "./auth-api.client";

const moduleLogger = createModuleLogger("UserManagementService");

export class UserManagementService {
  constructor(
    private readonly authApiClient: AuthApiClient,
    private readonly customerRepository: CustomerRepository,
    private readonly dentistRepository: DentistRepository
  ) {}

  /** Removes the user's customer and dentist records, then the auth-service account. */
  async permanentlyDeleteUserByEmail(email: string): Promise<OperationResult<null>> {
    if (email.trim() === "") {
      return fail("VALIDATION_ERROR", "Email is required.");
    }

    if (!(await this.authApiClient.userExistsByEmail(email))) {
      return fail("NOT_FOUND", "User not found in the authentication system.");
    }

    const customer = await this.customerRepository.findByEmail(email);
    if (customer) {
      await this.customerRepository.delete(customer.id);
      moduleLogger.info({ customerId: customer.id, email }, "Customer record deleted");
    }

    const dentist = await this.dentistRepository.findByEmail(email);
    if (dentist) {
      await this.dentistRepository.delete(dentist.id);
      moduleLogger.info({ dentistId: dentist.id, email }, "Dentist record deleted");
    }

    if (!(await this.authApiClient.deleteUserByEmail(email))) {
      return fail("UPSTREAM_ERROR", "Failed to delete user from authentication system.");
    }

    moduleLogger.info({ email }, "User permanently deleted");
    return succeed("User permanently deleted from all systems.", null);
  }

  async userExists(email: string): Promise<boolean> {
    return this.authApiClient.userExistsByEmail(email);
  }
}
