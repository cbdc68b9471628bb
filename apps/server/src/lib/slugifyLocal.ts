// src/lib/slugifyLocal.ts
export function slugifyLocal(text: string, fallback = ""): string {
  const base = (text || "").toString().trim();

  if (!base) return fallback;

  const slug = base
    .toLowerCase()
    .replace(/ß/g, "ss")
    .normalize("NFD") // Umlaute -> Grundbuchstabe
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug || fallback;
}
