import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadSectionCatalog } from '../../src/config/sections';
import { AppConfig } from '../../src/config/app.config';
import { JwtSettings } from '../../src/config/jwt';
import { AppContext, buildContext } from '../../src/context';
import { SectionCatalog } from '../../src/types';
import { MemoryStore } from './memoryStore';

export const ROSTER_HEADER = 'Regd. No.,Name,Father Name,Parent Ph.-1';

export const SECTION_A_ROSTER = [
  ROSTER_HEADER,
  'R1,Asha,Ravi,9000000001',
  'R2,Bala,Kumar,9000000002',
  'R3,Chitra,Mohan,9000000003',
].join('\n');

export const catalog: SectionCatalog = loadSectionCatalog(path.join(__dirname, '../../config/sections.json'));

export const makeRosterDir = (files: Record<string, string> = {}): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rosters-'));
  for (const [filename, contents] of Object.entries(files)) {
    fs.writeFileSync(path.join(dir, filename), contents);
  }
  return dir;
};

export const removeDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};

export const TEST_JWT: JwtSettings = { accessSecret: 'test-secret', accessExpiry: '1h' };

export const testConfig = (rosterDir: string): AppConfig => ({
  nodeEnv: 'test',
  port: 0,
  corsOrigin: 'http://localhost:3000',
  rosterDir,
  sectionsFile: path.join(__dirname, '../../config/sections.json'),
  supabase: null,
  jwt: TEST_JWT,
  bcryptRounds: 4,
  rateLimit: { windowMs: 60000, max: 1000 },
});

export interface TestContext {
  ctx: AppContext;
  store: MemoryStore;
  rosterDir: string;
}

export const makeContext = (files: Record<string, string> = { 'II-CSE_A.csv': SECTION_A_ROSTER }): TestContext => {
  const rosterDir = makeRosterDir(files);
  const store = new MemoryStore();
  const ctx = buildContext(testConfig(rosterDir), catalog, store, store);
  return { ctx, store, rosterDir };
};
