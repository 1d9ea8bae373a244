import { chmod, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { USER_ROLES } from './schemas.js';

const credentialsSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  userId: z.string().min(1),
  email: z.string(),
  role: z.enum(USER_ROLES),
  displayName: z.string().nullable(),
  savedAt: z.string(),
});

export type Credentials = z.infer<typeof credentialsSchema>;

function isMissingFile(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Stored as `credentials.json` under the CLI home, readable by the owner only. */
export class CredentialStore {
  readonly file: string;

  constructor(private readonly homeDir: string) {
    this.file = path.join(homeDir, 'credentials.json');
  }

  async load(): Promise<Credentials | null> {
    let raw: string;
    try {
      raw = await readFile(this.file, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      return null;
    }
    const parsed = credentialsSchema.safeParse(data);
    return parsed.success ? parsed.data : null;
  }

  async save(credentials: Credentials) {
    await mkdir(this.homeDir, { recursive: true, mode: 0o700 });
    await writeFile(this.file, `${JSON.stringify(credentials, null, 2)}\n`, { mode: 0o600 });
    // writeFile keeps the mode of an existing file.
    await chmod(this.file, 0o600);
  }

  async clear() {
    await rm(this.file, { force: true });
  }
}
