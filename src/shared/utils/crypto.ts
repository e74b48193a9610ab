import crypto from "crypto";

const PASSWORD_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!@#$%";

// Generate UUID v4
export const generateUUID = (): string => {
  return crypto.randomUUID();
};

// Generate correlation ID for request tracking
export const generateCorrelationId = (): string => {
  return `${Date.now()}-${crypto.randomBytes(6).toString("hex")}`;
};

// Initial password handed to the auth service for a provisioned account
export const generatePassword = (length: number = 12): string => {
  let password = "";
  for (let i = 0; i < length; i++) {
    password += PASSWORD_ALPHABET.charAt(crypto.randomInt(PASSWORD_ALPHABET.length));
  }
  return password;
};

// "<local-part>_<n>" with n in [0, 10000)
export const generateUsername = (email: string): string => {
  const localPart = email.split("@")[0] ?? email;
  return `${localPart}_${crypto.randomInt(10000)}`;
};
