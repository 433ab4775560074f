import { createHash, createHmac } from "node:crypto";

/** HMAC-SHA256 over the UTF-8 bytes of `message`, lowercase hex. */
export function hmacSha256Hex(secret: string, message: string): string {
	return createHmac("sha256", secret).update(message, "utf8").digest("hex");
}

/** HMAC-SHA256 over the UTF-8 bytes of `message`, standard padded base64. */
export function hmacSha256Base64(secret: string, message: string): string {
	return createHmac("sha256", secret).update(message, "utf8").digest("base64");
}

/** SHA-512 of the UTF-8 bytes of `message`, lowercase hex. */
export function sha512Hex(message: string): string {
	return createHash("sha512").update(message, "utf8").digest("hex");
}
