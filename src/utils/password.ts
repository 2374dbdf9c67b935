import bcrypt from "bcryptjs";

export async function hashPassword(plain: string, rounds: number): Promise<string> {
  return bcrypt.hash(plain, rounds);
}

/** False for a mismatch and for any digest bcrypt cannot parse. */
export async function verifyPassword(plain: string, digest: string | null | undefined): Promise<boolean> {
  if (!digest) return false;
  try {
    return await bcrypt.compare(plain, digest);
  } catch (err) {
    console.warn("Password digest could not be parsed", { reason: err instanceof Error ? err.message : String(err) });
    return false;
  }
}
