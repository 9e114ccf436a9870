import { generateCode, DEFAULT_CODE_LENGTH } from "./code_generator.js";
import { CodeGenerationError, DuplicateCodeError } from "./errors.js";
import type { ShortLink, UrlStore } from "./storage.js";

export interface CreateLinkInput {
  longUrl: string;
  customCode?: string;
  expiresAt: Date | null;
}

export interface CreateLinkOptions {
  codeLength?: number;
  maxAttempts?: number;
  generate?: (length: number) => string;
}

/**
 * Inserts a link under the custom code, or under a generated one. A custom code
 * that is taken rejects with DuplicateCodeError; a generated code that collides
 * is replaced with a fresh one, up to `maxAttempts` inserts.
 */
export async function createLink(
  store: UrlStore,
  input: CreateLinkInput,
  { codeLength = DEFAULT_CODE_LENGTH, maxAttempts = 5, generate = generateCode }: CreateLinkOptions = {}
): Promise<ShortLink> {
  const { longUrl, customCode, expiresAt } = input;

  if (customCode) {
    return store.create({ longUrl, shortCode: customCode, expiresAt });
  }

  for (let i = 0; i < maxAttempts; i++) {
    try {
      return await store.create({ longUrl, shortCode: generate(codeLength), expiresAt });
    } catch (e) {
      if (e instanceof DuplicateCodeError) continue;
      throw e;
    }
  }
  throw new CodeGenerationError(maxAttempts);
}
