/**
 * Composition root: one DataSource, one session, and the repositories and
 * services that share it.
 *
 * @example
 * ```typescript
 * const app = await createApp({ ...loadConfig() });
 * const grade = await app.grades.create({ gradeName: '1°' });
 * await app.close();
 * ```
 */

import { DataSource } from './data-source';
import { defineConfig } from './config';
import type { LogLevel } from './logger';
import { Grade } from './classrooms/grade.entity';
import { Section } from './classrooms/section.entity';
import { GradeRepository } from './classrooms/grade.repository';
import { SectionRepository } from './classrooms/section.repository';
import { GradeService } from './classrooms/grade.service';
import { SectionService } from './classrooms/section.service';

export interface AppOptions {
  dbPath: string;
  synchronize?: boolean;
  logging?: boolean;
  busyTimeout?: number;
  logLevel?: LogLevel;
  onAudit?: (label: string) => void;
}

export interface App {
  dataSource: DataSource;
  gradeRepository: GradeRepository;
  sectionRepository: SectionRepository;
  grades: GradeService;
  sections: SectionService;
  close(): Promise<void>;
}

export async function createApp(options: AppOptions): Promise<App> {
  const dataSource = new DataSource(
    defineConfig({
      dbPath: options.dbPath,
      // referenced before referencing, for schema creation
      entities: [Grade, Section],
      synchronize: options.synchronize ?? true,
      logging: options.logging ?? false,
      busyTimeout: options.busyTimeout,
    }),
  );
  await dataSource.initialize();

  const repositoryOptions = { logLevel: options.logLevel };
  const gradeRepository = new GradeRepository(dataSource.manager, repositoryOptions);
  const sectionRepository = new SectionRepository(dataSource.manager, repositoryOptions);
  const serviceOptions = { logLevel: options.logLevel, onAudit: options.onAudit };

  return {
    dataSource,
    gradeRepository,
    sectionRepository,
    grades: new GradeService(gradeRepository, serviceOptions),
    sections: new SectionService(sectionRepository, gradeRepository, serviceOptions),
    close: () => dataSource.destroy(),
  };
}
