import type { Page, Row } from '../types';
import type { Grade } from './grade.entity';
import type { Section } from './section.entity';

export interface GradeRequest {
  gradeName: string;
}

export interface SectionRequest {
  sectionName: string;
  gradeId?: number | null;
}

export interface GradeResponse {
  id: number;
  gradeName: string;
  /** ISO 8601 */
  createdAt: string;
  updatedAt: string | null;
}

export interface SectionResponse {
  id: number;
  sectionName: string;
  gradeId: number | null;
  active: boolean;
  createdAt: string;
  updatedAt: string | null;
}

export interface MessageResponse {
  statusCode: number;
  success: boolean;
  message: string;
  details?: string;
}

export interface GradePageSearch {
  page: number;
  size: number;
  /** Exact grade name. */
  gradeName?: string;
  createdFrom?: Date;
  createdTo?: Date;
}

export interface SectionPageSearch {
  page: number;
  size: number;
  sectionName?: string;
  gradeId?: number;
  createdFrom?: Date;
  createdTo?: Date;
  updatedFrom?: Date;
  updatedTo?: Date;
}

export function toGradeResponse(grade: Grade): GradeResponse {
  return {
    id: grade.id,
    gradeName: grade.gradeName,
    createdAt: grade.createdAt.toISOString(),
    updatedAt: grade.updatedAt ? grade.updatedAt.toISOString() : null,
  };
}

export function toSectionResponse(section: Section): SectionResponse {
  return {
    id: section.id,
    sectionName: section.sectionName,
    gradeId: section.gradeId ?? null,
    active: section.active,
    createdAt: section.createdAt.toISOString(),
    updatedAt: section.updatedAt ? section.updatedAt.toISOString() : null,
  };
}

export function toPageResponse<T, R>(page: Page<T>, map: (item: T) => R): Page<R> {
  return { data: page.data.map(map), meta: page.meta };
}

/** Number of sections attached to one grade. */
export class GradeSectionCount {
  constructor(
    readonly gradeId: number,
    readonly gradeName: string,
    readonly sectionCount: number,
  ) {}

  static fromRow(row: Row): GradeSectionCount {
    return new GradeSectionCount(Number(row.grade_id), String(row.grade_name), Number(row.section_count));
  }
}
