import { describe, expect, it } from "vitest";
import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { CreateUserRequest, HttpAuthApiClient, LocalAuthApiClient } from "../services/auth-api.client";

interface StubResponse {
  status: number;
  data?: unknown;
}

// Axios adapter that answers from a script and records each request
const createStubServer = (...responses: StubResponse[]) => {
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push(config);
    const next = responses.shift() ?? { status: 500 };
    const response: AxiosResponse = {
      data: next.data,
      status: next.status,
      statusText: String(next.status),
      headers: {},
      config,
    };

    if (next.status >= 400) {
      throw new AxiosError(`Request failed with status code ${next.status}`, "ERR_BAD_RESPONSE", config, null, response);
    }
    return response;
  };

  const client = new HttpAuthApiClient(
    { baseUrl: "http://auth.test", apiKey: "test-secret", timeoutSeconds: 5 },
    { adapter }
  );

  return { client, requests };
};

const user: CreateUserRequest = {
  username: "jane.doe_42",
  email: "jane.doe@example.com",
  password: "test-password",
  role: "Customer",
  firstName: "Jane",
  lastName: "Doe",
};

describe("HttpAuthApiClient", () => {
  it("registers a user and sends the api key", async () => {
    const { client, requests } = createStubServer({ status: 200, data: { success: true } });

    expect(await client.createUser(user)).toBe(true);

    const request = requests[0];
    expect(request?.method).toBe("post");
    expect(request?.url).toBe("/api/auth/register");
    expect(request?.baseURL).toBe("http://auth.test");
    expect(request?.headers.get("X-API-Key")).toBe("test-secret");
    expect(JSON.parse(String(request?.data))).toEqual({
      username: "jane.doe_42",
      email: "jane.doe@example.com",
      password: "test-password",
      role: "Customer",
    });
  });

  it("treats a refusal, a malformed body or an error status as failure", async () => {
    expect(await createStubServer({ status: 200, data: { success: false, message: "taken" } }).client.createUser(user)).toBe(
      false
    );
    expect(await createStubServer({ status: 200, data: "ok" }).client.createUser(user)).toBe(false);
    expect(await createStubServer({ status: 409 }).client.createUser(user)).toBe(false);
  });

  it("checks existence by email", async () => {
    const { client, requests } = createStubServer(
      { status: 200, data: { exists: true } },
      { status: 404 },
      { status: 503 },
      { status: 200, data: {} }
    );

    expect(await client.userExistsByEmail("a+b@example.com")).toBe(true);
    expect(requests[0]?.url).toBe("/api/auth/user/email/a%2Bb%40example.com/exists");
    expect(await client.userExistsByEmail("a@example.com")).toBe(false);
    expect(await client.userExistsByEmail("a@example.com")).toBe(false);
    expect(await client.userExistsByEmail("a@example.com")).toBe(false);
  });

  it("deletes by email and treats a missing user as deleted", async () => {
    const { client, requests } = createStubServer({ status: 204 }, { status: 404 }, { status: 500 });

    expect(await client.deleteUserByEmail("jane.doe@example.com")).toBe(true);
    expect(requests[0]?.method).toBe("delete");
    expect(requests[0]?.url).toBe("/api/auth/user/email/jane.doe%40example.com");
    expect(await client.deleteUserByEmail("jane.doe@example.com")).toBe(true);
    expect(await client.deleteUserByEmail("jane.doe@example.com")).toBe(false);
  });
});

describe("LocalAuthApiClient", () => {
  it("keeps users keyed by email, ignoring case", async () => {
    const client = new LocalAuthApiClient();

    expect(await client.createUser(user)).toBe(true);
    expect(await client.createUser({ ...user, email: "JANE.DOE@example.com" })).toBe(false);
    expect(await client.userExistsByEmail("Jane.Doe@Example.com")).toBe(true);
    expect(await client.deleteUserByEmail("jane.doe@example.com")).toBe(true);
    expect(await client.userExistsByEmail("jane.doe@example.com")).toBe(false);
  });
});
