// src/lib/format.ts
const EUR_NUMBER = new Intl.NumberFormat("de-DE", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Formatiert einen Betrag als Euro-String ("1.234,50 €").
 * Mit `signed` bekommen Einnahmen ein "+ " und Ausgaben ein "- " vorangestellt.
 */
export function euro(amount: number, signed = false): string {
  const rounded = Math.round(amount * 100) / 100;
  const text = `${EUR_NUMBER.format(Math.abs(rounded))} €`;
  if (rounded < 0) return signed ? `- ${text}` : `-${text}`;
  if (signed && rounded > 0) return `+ ${text}`;
  return text;
}

/** Eine HTML-Tabellenzelle. Inhalt muss bereits escaped sein. */
export function cell(content: string | number = ""): string {
  return `<td>${content}</td>`;
}

export function escapeHtml(s: string): string {
  return String(s)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}
