import dotenv from 'dotenv';
dotenv.config();

import { UserRole } from '../types';
import { loadAppConfig } from '../config/app.config';
import { createSupabaseAdmin } from '../config/supabase';
import { SupabaseAttendanceRepository } from '../repositories/supabaseAttendance.repository';
import { AuthService } from '../services/auth.service';
import logger from '../config/logger';

const DEFAULT_USERS: ReadonlyArray<{ username: string; role: UserRole }> = [
  { username: 'fac1', role: 'Faculty' },
  { username: 'hod', role: 'HOD' },
  { username: 'admin', role: 'Admin' },
  { username: 'coord', role: 'Coordinator' },
];

// SEED_FAC1_PASSWORD, SEED_HOD_PASSWORD, ... override SEED_DEFAULT_PASSWORD per user.
const passwordFor = (username: string): string =>
  process.env[`SEED_${username.toUpperCase()}_PASSWORD`] || process.env.SEED_DEFAULT_PASSWORD || 'changeme';

const seedDatabase = async () => {
  try {
    const config = loadAppConfig();
    if (!config.supabase) {
      throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set');
    }
    const repository = new SupabaseAttendanceRepository(createSupabaseAdmin(config.supabase));
    const auth = new AuthService(repository, config.bcryptRounds);

    const users = await auth.seedUsers(DEFAULT_USERS.map((user) => ({ ...user, password: passwordFor(user.username) })));
    for (const user of users) {
      logger.info(`Seeded user ${user.username} (${user.role})`);
    }
    logger.info('Database seeding completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error('Error seeding database:', error);
    process.exit(1);
  }
};

void seedDatabase();
