import axios, { AxiosInstance, CreateAxiosDefaults, isAxiosError } from "axios";
import { z } from "zod";
import { config } from "@/shared/config/environment";
import { createModuleLogger } from "@/shared/config/logger";

const moduleLogger = createModuleLogger("AuthApiClient");

export type AuthRole = "Customer" | "Dentist" | "Admin";

export interface CreateUserRequest {
  username: string;
  email: string;
  password: string;
  role: AuthRole;
  firstName: string;
  lastName: string;
}

/** External authentication service. Every call reports failure as `false` instead of throwing. */
export interface AuthApiClient {
  createUser(request: CreateUserRequest): Promise<boolean>;
  deleteUserByEmail(email: string): Promise<boolean>;
  userExistsByEmail(email: string): Promise<boolean>;
}

const registerResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
});

const existsResponseSchema = z.object({
  exists: z.boolean(),
});

export interface HttpAuthApiOptions {
  baseUrl: string;
  apiKey?: string | undefined;
  timeoutSeconds: number;
}

const describeFailure = (error: unknown): Record<string, unknown> => {
  if (isAxiosError(error)) {
    return {
      status: error.response?.status,
      data: error.response?.data,
      code: error.code,
      message: error.message,
    };
  }
  return { err: error };
};

export class HttpAuthApiClient implements AuthApiClient {
  private readonly http: AxiosInstance;

  constructor(options: HttpAuthApiOptions = config.authApi, defaults: CreateAxiosDefaults = {}) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutSeconds * 1000,
      headers: {
        "Content-Type": "application/json",
        ...(options.apiKey ? { "X-API-Key": options.apiKey } : {}),
      },
      ...defaults,
    });
  }

  async createUser(request: CreateUserRequest): Promise<boolean> {
    try {
      moduleLogger.info({ email: request.email, role: request.role }, "Creating user in auth service");

      const response = await this.http.post("/api/auth/register", {
        username: request.username,
        email: request.email,
        password: request.password,
        role: request.role,
      });

      const body = registerResponseSchema.safeParse(response.data);
      if (!body.success || !body.data.success) {
        moduleLogger.warn(
          { email: request.email, message: body.success ? body.data.message : "Malformed response" },
          "Auth service refused user creation"
        );
        return false;
      }

      moduleLogger.info({ email: request.email }, "User created in auth service");
      return true;
    } catch (error) {
      moduleLogger.error({ email: request.email, ...describeFailure(error) }, "Failed to create user in auth service");
      return false;
    }
  }

  async deleteUserByEmail(email: string): Promise<boolean> {
    try {
      await this.http.delete(`/api/auth/user/email/${encodeURIComponent(email)}`);
      moduleLogger.info({ email }, "User deleted from auth service");
      return true;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        moduleLogger.warn({ email }, "User not found in auth service, treating as deleted");
        return true;
      }
      moduleLogger.error({ email, ...describeFailure(error) }, "Failed to delete user from auth service");
      return false;
    }
  }

  async userExistsByEmail(email: string): Promise<boolean> {
    try {
      const response = await this.http.get(`/api/auth/user/email/${encodeURIComponent(email)}/exists`);
      const body = existsResponseSchema.safeParse(response.data);
      const exists = body.success && body.data.exists;

      moduleLogger.debug({ email, exists }, "User existence checked");
      return exists;
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return false;
      }
      moduleLogger.error({ email, ...describeFailure(error) }, "Failed to check user in auth service");
      return false;
    }
  }
}

// In-process registry used when no auth service is configured
export class LocalAuthApiClient implements AuthApiClient {
  private readonly users = new Map<string, CreateUserRequest>();

  async createUser(request: CreateUserRequest): Promise<boolean> {
    const key = request.email.toLowerCase();
    if (this.users.has(key)) {
      return false;
    }
    this.users.set(key, { ...request });
    moduleLogger.info({ email: request.email, role: request.role }, "User registered locally");
    return true;
  }

  async deleteUserByEmail(email: string): Promise<boolean> {
    this.users.delete(email.toLowerCase());
    return true;
  }

  async userExistsByEmail(email: string): Promise<boolean> {
    return this.users.has(email.toLowerCase());
  }
}
