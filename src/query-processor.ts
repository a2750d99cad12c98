import type { LessonFilters } from './cache-keys.js';
import type { FilterOptions, LecturerOption, Lesson, NamedOption, ScheduleEntry } from './schemas.js';
import { stableId } from './stable-id.js';

/**
 * `"Иванов Иван Петрович"` → `"Иванов И.П."`. Single-word names are returned as is.
 */
export function shortName(fullName: string): string {
  const parts = fullName.trim().split(/\s+/);
  if (parts.length < 2) return fullName;
  const initials = parts
    .slice(1)
    .map((part) => `${part.charAt(0)}.`)
    .join('');
  return `${parts[0]} ${initials}`;
}

function lecturerName(entry: ScheduleEntry): string {
  return entry.lecturer_title || entry.lecturer || '';
}

/** The upstream lecturer id, when it is a usable integer */
function upstreamLecturerId(entry: ScheduleEntry): number | undefined {
  const raw = entry.lecturerOid;
  if (typeof raw === 'number') {
    return Number.isSafeInteger(raw) ? raw : undefined;
  }
  if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) {
    const parsed = Number(raw.trim());
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Lecturer id used everywhere: the upstream id when present, otherwise the
 * stable id of the lecturer's name.
 */
export function lecturerIdOf(entry: ScheduleEntry): number | null {
  const upstream = upstreamLecturerId(entry);
  if (upstream !== undefined) return upstream;
  const name = lecturerName(entry);
  return name ? stableId(name) : null;
}

export function disciplineIdOf(entry: ScheduleEntry): number | null {
  return entry.discipline ? stableId(entry.discipline) : null;
}

export function locationIdOf(entry: ScheduleEntry): number | null {
  return entry.building ? stableId(entry.building) : null;
}

class OptionSet<T extends NamedOption> {
  private readonly seen = new Set<string>();
  readonly items: T[] = [];

  add(option: T): void {
    const identity = `${option.id}\u0000${option.name}`;
    if (this.seen.has(identity)) return;
    this.seen.add(identity);
    this.items.push(option);
  }
}

export interface FilterOptionsQuery {
  /** Keep only entries taught by this lecturer (entries without a lecturer id are kept) */
  personId?: number;
}

/**
 * Collect the distinct disciplines, locations and lecturers of a schedule,
 * in order of first appearance.
 */
export function buildFilterOptions(
  entries: readonly ScheduleEntry[],
  query: FilterOptionsQuery = {}
): FilterOptions {
  const disciplines = new OptionSet<NamedOption>();
  const locations = new OptionSet<NamedOption>();
  const lecturers = new OptionSet<LecturerOption>();

  for (const entry of entries) {
    if (!entry.date) continue;

    if (query.personId !== undefined) {
      const upstream = upstreamLecturerId(entry);
      if (upstream !== undefined && upstream !== query.personId) continue;
    }

    const disciplineId = disciplineIdOf(entry);
    if (disciplineId !== null && entry.discipline) {
      disciplines.add({ id: disciplineId, name: entry.discipline });
    }

    const locationId = locationIdOf(entry);
    if (locationId !== null && entry.building) {
      locations.add({ id: locationId, name: entry.building });
    }

    const name = lecturerName(entry);
    const lecturerId = lecturerIdOf(entry);
    if (name && lecturerId !== null) {
      lecturers.add({ id: lecturerId, name, short: shortName(name) });
    }
  }

  return {
    disciplines: disciplines.items,
    locations: locations.items,
    lecturers: lecturers.items,
  };
}

function allows(allowList: readonly number[] | null | undefined, id: number | null): boolean {
  if (allowList === null || allowList === undefined) return true;
  return id !== null && allowList.includes(id);
}

/**
 * Turn schedule rows into lessons, keeping only those every allow-list admits.
 * Rows without a date or without both lesson times are skipped.
 */
export function buildLessons(entries: readonly ScheduleEntry[], filters: LessonFilters = {}): Lesson[] {
  const lessons: Lesson[] = [];

  for (const entry of entries) {
    if (!entry.date || !entry.beginLesson || !entry.endLesson) continue;

    const disciplineId = disciplineIdOf(entry);
    const locationId = locationIdOf(entry);
    const lecturerId = lecturerIdOf(entry);

    if (
      !allows(filters.disciplineIds, disciplineId) ||
      !allows(filters.locationIds, locationId) ||
      !allows(filters.lecturerIds, lecturerId)
    ) {
      continue;
    }

    const name = lecturerName(entry);

    lessons.push({
      start: `${entry.date}T${entry.beginLesson}Z`,
      end: `${entry.date}T${entry.endLesson}Z`,
      lecturerInfo: {
        lecturerId,
        lecturerName: name,
        lecturerNameShort: name ? shortName(name) : '',
      },
      locationInfo: {
        locationId,
        locationName: entry.building ?? '',
        cabinet: entry.auditorium ?? '',
      },
      disciplineInfo: {
        disciplineId,
        disciplineName: entry.discipline ?? '',
      },
      kindOfWork: entry.kindOfWork ?? '',
    });
  }

  return lessons;
}
