export type Section = {
  id: string;
  name: string;
  createdAt: number;
};

export type CreateSectionResult = { kind: "ok"; section: Section } | { kind: "conflict"; field: "name" | "slug" };

/** Trims and collapses inner whitespace; this is the stored display name. */
export function normalizeSectionName(raw: string): string {
  return String(raw ?? "").trim().replace(/\s+/g, " ");
}

/** Case-insensitive key used to enforce name uniqueness. */
export function sectionNameKey(raw: string): string {
  return normalizeSectionName(raw).toLowerCase();
}

export function sectionSlug(raw: string): string {
  const slug = normalizeSectionName(raw)
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 64)
    .replace(/-+$/g, "");
  return slug || "section";
}
