// src/services/aktive/query.ts
import { z } from "zod";
import { QueryError } from "../../lib/httpError";
import { Abrechnung, POSITION_COUNT } from "./abrechnung";

/* ===== Querystring des Formulars =====
 *
 * name, group, project, date
 * p1name … p7name, p1count, p1price, p1income, p1cost
 * donations, accountname, iban, ibanmode, sepamode, ibanknown
 */

// Bei mehrfach vorkommenden Schlüsseln zählt der erste Wert
export const aktiveQuerySchema = z.record(
  z.string(),
  z
    .union([z.string(), z.array(z.string()).nonempty()])
    .transform((v) => (Array.isArray(v) ? v[0] : v))
);

export type AktiveQuery = z.infer<typeof aktiveQuerySchema>;

const AMOUNT_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const COUNT_RE = /^[+-]?\d+$/;
// Obergrenzen, damit Stückpreis × Anzahl endlich bleibt
export const MAX_AMOUNT = 1e9;
export const MAX_COUNT = 1e6;
const TRUTHY = new Set(["1", "true", "on", "yes", "ja"]);

/** "12,50" und "1.234,50" werden wie "12.50" bzw. "1234.50" gelesen. */
export function parseAmount(key: string, raw: string): number {
  let s = raw.trim();
  if (s.includes(",")) s = s.replace(/\./g, "").replace(",", ".");
  if (!AMOUNT_RE.test(s)) {
    throw new QueryError(key, `Ungültiger Betrag für "${key}": ${raw}`);
  }
  const n = Number(s);
  if (Math.abs(n) > MAX_AMOUNT) {
    throw new QueryError(key, `Betrag zu groß für "${key}": ${raw}`);
  }
  return n;
}

export function parseCount(key: string, raw: string): number {
  const s = raw.trim();
  if (!COUNT_RE.test(s)) {
    throw new QueryError(key, `Ungültige Anzahl für "${key}": ${raw}`);
  }
  const n = parseInt(s, 10);
  if (Math.abs(n) > MAX_COUNT) {
    throw new QueryError(key, `Anzahl zu groß für "${key}": ${raw}`);
  }
  return n;
}

/**
 * Überträgt die Formularwerte in die Abrechnung.
 * Leere Werte werden übersprungen. Nicht lesbare Zahlen werfen einen
 * QueryError; alle anderen ungültigen Werte werden still auf den
 * Standardwert gesetzt und als Schlüssel zurückgegeben.
 */
export function evaluateQuery(abrechnung: Abrechnung, query: AktiveQuery): string[] {
  const corrected: string[] = [];
  const get = (key: string) => {
    const v = query[key];
    return v === undefined || v.trim() === "" ? undefined : v;
  };
  const check = (key: string, accepted: boolean) => {
    if (!accepted) corrected.push(key);
  };

  const name = get("name");
  if (name !== undefined) abrechnung.username = name;
  const group = get("group");
  if (group !== undefined) abrechnung.usergroup = group;
  const project = get("project");
  if (project !== undefined) abrechnung.projectname = project;
  const date = get("date");
  if (date !== undefined) check("date", abrechnung.setProjectdate(date.trim()));

  for (let i = 0; i < POSITION_COUNT; i++) {
    const position = abrechnung.positions[i];
    const prefix = `p${i + 1}`;

    const pname = get(`${prefix}name`);
    if (pname !== undefined) position.name = pname;

    const count = get(`${prefix}count`);
    if (count !== undefined) {
      check(`${prefix}count`, position.setUnitcount(parseCount(`${prefix}count`, count)));
    }

    const price = get(`${prefix}price`);
    if (price !== undefined) position.unitprice = parseAmount(`${prefix}price`, price);

    const income = get(`${prefix}income`);
    if (income !== undefined) position.income = parseAmount(`${prefix}income`, income);

    // Ausgaben überschreiben Einnahmen nur, wenn sie ungleich 0 sind
    const cost = get(`${prefix}cost`);
    if (cost !== undefined) {
      const amount = parseAmount(`${prefix}cost`, cost);
      if (amount !== 0) position.cost = amount;
    }
  }

  const donations = get("donations");
  if (donations !== undefined) {
    check("donations", abrechnung.setDonations(parseAmount("donations", donations)));
  }

  const accountname = get("accountname");
  if (accountname !== undefined) abrechnung.accountname = accountname;
  const iban = get("iban");
  if (iban !== undefined) check("iban", abrechnung.setIban(iban));

  const ibanmode = get("ibanmode");
  if (ibanmode !== undefined) check("ibanmode", abrechnung.setIbanmode(ibanmode));
  const sepamode = get("sepamode");
  if (sepamode !== undefined) check("sepamode", abrechnung.setSepamode(sepamode));

  const ibanknown = get("ibanknown");
  abrechnung.ibanknown = ibanknown !== undefined && TRUTHY.has(ibanknown.trim().toLowerCase());

  return corrected;
}
