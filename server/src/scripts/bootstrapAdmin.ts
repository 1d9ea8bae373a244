import { z } from 'zod';
import { supabase } from '../supabase.js';
import { hashPassword } from '../utils/passwords.js';
import { ensureRows, handleSupabaseSingle } from '../utils/supabase.js';
import { logger } from '../logger.js';
import type { UserRow } from '../types.js';

// The first admin cannot be invited, so it is created directly.
const bootstrapSchema = z.object({
  BOOTSTRAP_ADMIN_EMAIL: z.string().email(),
  BOOTSTRAP_ADMIN_PASSWORD: z.string().min(8),
  BOOTSTRAP_ADMIN_NAME: z.string().min(1).default('Admin'),
});

async function main() {
  const config = bootstrapSchema.parse(process.env);

  const admins = ensureRows<Pick<UserRow, 'id'>>(
    await supabase.from('users').select('id').eq('role', 'admin'),
    'Failed to check for existing admins',
  );
  if (admins.length > 0) {
    logger.info('bootstrap_admin_skipped', { existingAdmins: admins.length });
    return;
  }

  const admin = handleSupabaseSingle<UserRow>(
    await supabase
      .from('users')
      .insert({
        email: config.BOOTSTRAP_ADMIN_EMAIL.trim().toLowerCase(),
        password_hash: await hashPassword(config.BOOTSTRAP_ADMIN_PASSWORD),
        display_name: config.BOOTSTRAP_ADMIN_NAME,
        role: 'admin',
        active: true,
      })
      .select('id, email, password_hash, display_name, role, swimmer_id, active')
      .maybeSingle(),
    'Failed to create admin user',
  );

  logger.info('bootstrap_admin_created', { userId: admin.id, email: admin.email });
}

main().catch((error: unknown) => {
  logger.error('bootstrap_admin_failed', { error });
  process.exitCode = 1;
});
