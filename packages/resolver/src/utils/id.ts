import { nanoid } from "nanoid";

/**
 * Generates a new unique ID (nanoid: URL-safe, 21 characters).
 */
export function generateId(): string {
  return nanoid();
}
