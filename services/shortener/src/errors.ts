export class DuplicateCodeError extends Error {
  constructor(readonly shortCode: string) {
    super(`Short code already exists: ${shortCode}`);
    this.name = "DuplicateCodeError";
  }
}

export class CodeGenerationError extends Error {
  constructor(readonly attempts: number) {
    super(`Failed to generate unique code after ${attempts} attempts`);
    this.name = "CodeGenerationError";
  }
}

/** Driver errors (pg, better-sqlite3) carry a string `code`. */
export function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
