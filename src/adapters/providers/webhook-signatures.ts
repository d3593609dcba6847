import { createHmac, timingSafeEqual } from "node:crypto";

const DEFAULT_TOLERANCE_SECONDS = 300;

function safeEqual(expected: string, received: string): boolean {
  const expectedBuffer = Buffer.from(expected);
  const receivedBuffer = Buffer.from(received);
  return expectedBuffer.length === receivedBuffer.length && timingSafeEqual(expectedBuffer, receivedBuffer);
}

export function signStripePayload(secret: string, timestamp: number, body: string): string {
  const digest = createHmac("sha256", secret).update(`${timestamp}.${body}`).digest("hex");
  return `t=${timestamp},v1=${digest}`;
}

/** Checks a `t=<unix>,v1=<hex>` header; any of several `v1` entries may match. */
export function verifyStripeSignature(
  secret: string,
  header: string,
  body: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
  toleranceSeconds: number = DEFAULT_TOLERANCE_SECONDS,
): boolean {
  const parts = header.split(",").map((part) => part.trim().split("="));
  const timestamp = Number(parts.find(([name]) => name === "t")?.[1]);
  const candidates = parts.filter(([name]) => name === "v1").map(([, value]) => value ?? "");
  if (!Number.isInteger(timestamp) || candidates.length === 0) {
    return false;
  }
  if (Math.abs(nowSeconds - timestamp) > toleranceSeconds) {
    return false;
  }
  const expected = createHmac("sha256", secret).update(`${timestamp}.${body}`).digest("hex");
  return candidates.some((candidate) => safeEqual(expected, candidate));
}

export function signAdyenPayload(hmacKeyBase64: string, body: string): string {
  return createHmac("sha256", Buffer.from(hmacKeyBase64, "base64")).update(body).digest("base64");
}

export function verifyAdyenSignature(hmacKeyBase64: string, signature: string, body: string): boolean {
  return safeEqual(signAdyenPayload(hmacKeyBase64, body), signature.trim());
}
