import { AppConfig } from './config/app.config';
import { AttendanceStore, UserStore } from './repositories/attendance.repository';
import { AttendanceService } from './services/attendance.service';
import { AuthService } from './services/auth.service';
import { ReportService } from './services/report.service';
import { RosterService } from './services/roster.service';
import { SectionResolver } from './services/sectionResolver.service';
import { SectionCatalog } from './types';

export interface AppContext {
  config: AppConfig;
  resolver: SectionResolver;
  rosters: RosterService;
  reports: ReportService;
  attendance: AttendanceService;
  auth: AuthService;
}

export const buildContext = (
  config: AppConfig,
  catalog: SectionCatalog,
  store: AttendanceStore,
  users: UserStore
): AppContext => {
  const resolver = new SectionResolver(catalog, config.rosterDir);
  const rosters = new RosterService(resolver, config.rosterDir);
  return {
    config,
    resolver,
    rosters,
    reports: new ReportService(store, resolver, rosters),
    attendance: new AttendanceService(store, resolver, rosters),
    auth: new AuthService(users, config.bcryptRounds),
  };
};
