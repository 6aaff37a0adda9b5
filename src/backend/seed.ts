/**
 * Sample folders and notes for previews and demos
 */
import type { Backend } from "./backend";

interface SeedFolder {
  name: string;
  /** Title prefix; notes are numbered from 1 */
  notePrefix: string;
  noteCount: number;
  children?: SeedFolder[];
}

const SAMPLE_TREE: SeedFolder[] = [
  {
    name: "Work",
    notePrefix: "Work note",
    noteCount: 3,
    children: [
      { name: "Projects", notePrefix: "Project note", noteCount: 2 },
      { name: "Meetings", notePrefix: "Meeting minutes", noteCount: 2 },
    ],
  },
  {
    name: "Personal",
    notePrefix: "Personal note",
    noteCount: 2,
    children: [{ name: "Travel", notePrefix: "Travel plan", noteCount: 2 }],
  },
];

export interface SeedResult {
  folders: number;
  notes: number;
}

/**
 * Fill an empty database with a small folder tree. Does nothing when any
 * folder or note already exists.
 */
export function seedSampleData(backend: Backend): SeedResult {
  const existing = backend.db
    .prepare<[], { n: number }>("SELECT (SELECT COUNT(*) FROM folders) + (SELECT COUNT(*) FROM notes) AS n")
    .get();
  if (existing && existing.n > 0) return { folders: 0, notes: 0 };

  const result: SeedResult = { folders: 0, notes: 0 };

  const plant = (spec: SeedFolder, parentId: string | null) => {
    const folder = backend.folders.create(spec.name, parentId);
    result.folders++;
    for (let i = 1; i <= spec.noteCount; i++) {
      backend.notes.create({
        title: `${spec.notePrefix} ${i}`,
        content: `Contents of ${spec.notePrefix.toLowerCase()} ${i}`,
        folderId: folder.id,
      });
      result.notes++;
    }
    for (const child of spec.children ?? []) plant(child, folder.id);
  };

  backend.db.transaction(() => {
    for (const spec of SAMPLE_TREE) plant(spec, null);
  })();

  console.log(`[Backend] Seeded ${result.folders} folders and ${result.notes} notes`);
  return result;
}
