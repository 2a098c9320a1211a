import Database from "better-sqlite3";
import { z } from "zod";
import { ILibraryRepository } from "../../core/domain/repositories/library.repository.js";
import {
  LibraryItem,
  LibraryItemId,
  LibraryItemVariant,
} from "../../core/domain/entities/library-item.entity.js";
import { normalizeRelativePath } from "../utils/storage.utils.js";

/**
 * Attachment metadata as the hosting library serialises it:
 * `{ "original_image": "photo.jpg", "sizes": { "thumbnail": { "file": "photo-150x150.jpg" } } }`
 * An attachment without thumbnails may carry `"sizes": []`.
 */
const AttachmentMetadataSchema = z.record(z.unknown());
const SizesSchema = z.record(z.unknown());
const SizeEntrySchema = z.object({ file: z.string().nullish() }).passthrough();
const OriginalImageSchema = z.string().min(1);

type AttachmentRow = {
  id: number;
  attached_file: string | null;
  metadata: string | null;
};

/** Each field is validated on its own, so one bad entry drops only itself. */
export function parseAttachmentMetadata(raw: string | null): {
  originalFile: string | null;
  variants: LibraryItemVariant[];
} {
  if (!raw) return { originalFile: null, variants: [] };
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { originalFile: null, variants: [] };
  }
  const parsed = AttachmentMetadataSchema.safeParse(json);
  if (!parsed.success) return { originalFile: null, variants: [] };

  const original = OriginalImageSchema.safeParse(parsed.data.original_image);
  const sizes = SizesSchema.safeParse(parsed.data.sizes);
  const variants: LibraryItemVariant[] = [];
  for (const [name, entry] of Object.entries(sizes.success ? sizes.data : {})) {
    const size = SizeEntrySchema.safeParse(entry);
    if (size.success) variants.push({ name, file: size.data.file ?? "" });
  }
  return { originalFile: original.success ? original.data : null, variants };
}

export class SqliteLibraryRepository implements ILibraryRepository {
  constructor(private db: Database.Database) {}

  async countItems(): Promise<number> {
    const row = this.db
      .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM attachments")
      .get();
    return row?.total ?? 0;
  }

  async listItemIds(offset: number, limit: number): Promise<LibraryItemId[]> {
    const rows = this.db
      .prepare<[number, number], { id: number }>(
        "SELECT id FROM attachments ORDER BY id ASC LIMIT ? OFFSET ?",
      )
      .all(limit, offset);
    return rows.map((r) => r.id);
  }

  async getItem(id: LibraryItemId): Promise<LibraryItem | null> {
    const row = this.db
      .prepare<[number], AttachmentRow>(
        "SELECT id, attached_file, metadata FROM attachments WHERE id = ?",
      )
      .get(id);
    if (!row) return null;

    const primaryPath = row.attached_file
      ? normalizeRelativePath(row.attached_file) || null
      : null;
    const { originalFile, variants } = parseAttachmentMetadata(row.metadata);
    return { id: row.id, primaryPath, originalFile, variants };
  }
}
