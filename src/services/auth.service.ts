import bcrypt from 'bcrypt';
import { AuthResult, UserRole, UserSummary } from '../types';
import { UserStore } from '../repositories/attendance.repository';
import { ApiError } from '../utils/ApiError';

export class AuthService {
  constructor(private readonly users: UserStore, private readonly bcryptRounds: number) {}

  async authenticate(username: string, password: string): Promise<AuthResult> {
    const user = await this.users.findUser(username.trim());
    if (!user) return { valid: false, role: null };
    const valid = await bcrypt.compare(password, user.passwordHash);
    return { valid, role: valid ? user.role : null };
  }

  async saveUser(username: string, password: string, role: UserRole): Promise<UserSummary> {
    const name = username.trim();
    if (!name || !password) throw ApiError.badRequest('Username and password are required');
    const passwordHash = await bcrypt.hash(password, this.bcryptRounds);
    await this.users.upsertUser({ username: name, passwordHash, role });
    return { username: name, role };
  }

  /** Creates or overwrites each user; used by the seeder only. */
  async seedUsers(users: ReadonlyArray<{ username: string; password: string; role: UserRole }>): Promise<UserSummary[]> {
    const saved: UserSummary[] = [];
    for (const user of users) {
      saved.push(await this.saveUser(user.username, user.password, user.role));
    }
    return saved;
  }

  listUsers(): Promise<UserSummary[]> {
    return this.users.listUsers();
  }
}
