import crypto from "crypto";

export const generateNumericToken = (length: number = 6): string => {
  const min = Math.pow(10, length - 1);
  const max = Math.pow(10, length);
  return crypto.randomInt(min, max).toString();
};

// Generate UUID v4
export const generateUUID = (): string => {
  return crypto.randomUUID();
};

// Human-shareable booking reference, e.g. APT482913
export const generateConfirmationCode = (): string => {
  return `APT${generateNumericToken(6)}`;
};

// Generate HMAC signature for gateway callback verification
export const generateHMACSignature = (payload: string, secret: string): string => {
  return crypto.createHmac("sha256", secret).update(payload, "utf8").digest("hex");
};

export const verifyHMACSignature = (payload: string, signature: string, secret: string): boolean => {
  const expected = Buffer.from(generateHMACSignature(payload, secret));
  const received = Buffer.from(signature);

  if (expected.length !== received.length) {
    return false;
  }

  return crypto.timingSafeEqual(received, expected);
};

// Generate correlation ID
export const generateCorrelationId = (): string => {
  const timestamp = Date.now().toString(36);
  const randomPart = crypto.randomBytes(6).toString("hex");
  return `${timestamp}-${randomPart}`;
};
