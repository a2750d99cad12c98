import { z } from 'zod';

/**
 * Shapes of every payload that crosses the cache boundary, one per namespace.
 */

/** One row of the upstream schedule. Unknown fields are dropped */
export const scheduleEntrySchema = z.object({
  date: z.string().nullish(),
  beginLesson: z.string().nullish(),
  endLesson: z.string().nullish(),
  discipline: z.string().nullish(),
  building: z.string().nullish(),
  auditorium: z.string().nullish(),
  lecturer: z.string().nullish(),
  lecturer_title: z.string().nullish(),
  lecturerOid: z.union([z.number(), z.string()]).nullish(),
  kindOfWork: z.string().nullish(),
});

export type ScheduleEntry = z.infer<typeof scheduleEntrySchema>;

export const scheduleEntriesSchema = z.array(scheduleEntrySchema);

export const namedOptionSchema = z.object({
  id: z.number(),
  name: z.string(),
});

export const lecturerOptionSchema = namedOptionSchema.extend({
  short: z.string(),
});

export const filterOptionsSchema = z.object({
  disciplines: z.array(namedOptionSchema),
  locations: z.array(namedOptionSchema),
  lecturers: z.array(lecturerOptionSchema),
});

export type NamedOption = z.infer<typeof namedOptionSchema>;
export type LecturerOption = z.infer<typeof lecturerOptionSchema>;
export type FilterOptions = z.infer<typeof filterOptionsSchema>;

export const lessonSchema = z.object({
  start: z.string(),
  end: z.string(),
  lecturerInfo: z.object({
    lecturerId: z.number().nullable(),
    lecturerName: z.string(),
    lecturerNameShort: z.string(),
  }),
  locationInfo: z.object({
    locationId: z.number().nullable(),
    locationName: z.string(),
    cabinet: z.string(),
  }),
  disciplineInfo: z.object({
    disciplineId: z.number().nullable(),
    disciplineName: z.string(),
  }),
  kindOfWork: z.string(),
});

export type Lesson = z.infer<typeof lessonSchema>;

export const lessonsSchema = z.array(lessonSchema);

/** Raw item of the upstream search endpoint */
export const upstreamSearchItemSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  label: z.string().nullish(),
  description: z.string().nullish(),
});

export type UpstreamSearchItem = z.infer<typeof upstreamSearchItemSchema>;

export const searchTypeSchema = z.union([z.literal(1), z.literal(2)]);

/** 1 = group, 2 = lecturer */
export type SearchType = z.infer<typeof searchTypeSchema>;

export const searchResultSchema = z.object({
  type: searchTypeSchema,
  id: z.string(),
  name: z.string(),
  description: z.string(),
});

export type SearchResult = z.infer<typeof searchResultSchema>;

export const searchResultsSchema = z.array(searchResultSchema);
