// src/services/aktive/abrechnung.ts
import { euro } from "../../lib/format";
import { slugifyLocal } from "../../lib/slugifyLocal";
import { Position } from "./position";

export const POSITION_COUNT = 7;

/**
 * 1 – Ausgaben werden auf das Konto überwiesen.
 * 2 – Einnahmen werden vom Konto abgebucht.
 * 3 – Einnahmen werden vom Aktiven überwiesen.
 */
export type IbanMode = 1 | 2 | 3;

/**
 * 2 – SEPA-Mandat liegt noch nicht vor.
 * 3 – SEPA-Mandat ist veraltet.
 */
export type SepaMode = 2 | 3;

export type ModeInput = number | string | null | undefined;

export type Positions = readonly [
  Position, Position, Position, Position, Position, Position, Position,
];

const IBAN_LENGTH = 20;
const IBAN_SPACES = [18, 14, 10, 6, 2] as const;
const IBAN_MODES: readonly IbanMode[] = [1, 2, 3];
const SEPA_MODES: readonly SepaMode[] = [2, 3];

const INT_RE = /^\s*[+-]?\d+\s*$/;

function toInt(value: ModeInput): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? Math.trunc(value) : null;
  return INT_RE.test(value) ? parseInt(value, 10) : null;
}

function isUnset(value: ModeInput) {
  return value === null || value === undefined || value === "" || value === 0;
}

function isIbanMode(n: number | null): n is IbanMode {
  return IBAN_MODES.some((m) => m === n);
}

function isSepaMode(n: number | null): n is SepaMode {
  return SEPA_MODES.some((m) => m === n);
}

function isLeapYear(y: number) {
  return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0;
}

function daysInMonth(y: number, m: number) {
  if (m === 2) return isLeapYear(y) ? 29 : 28;
  return [4, 6, 9, 11].includes(m) ? 30 : 31;
}

/** Parst "Jahr-Monat-Tag"; gibt bei ungültigen Angaben null zurück. */
export function parseIsoDate(value: string): Date | null {
  const parts = value.split("-");
  if (parts.length < 3) return null;
  if (!parts.slice(0, 3).every((p) => INT_RE.test(p))) return null;

  const [y, m, d] = parts.slice(0, 3).map((p) => parseInt(p, 10));
  if (y < 1 || y > 9999 || m < 1 || m > 12) return null;
  if (d < 1 || d > daysInMonth(y, m)) return null;

  const date = new Date(0);
  date.setUTCFullYear(y, m - 1, d);
  return date;
}

export function formatIsoDate(date: Date | null): string {
  if (!date) return "";
  const y = String(date.getUTCFullYear()).padStart(4, "0");
  const m = String(date.getUTCMonth() + 1).padStart(2, "0");
  const d = String(date.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

function createPositions(): Positions {
  return [
    new Position(), new Position(), new Position(), new Position(),
    new Position(), new Position(), new Position(),
  ];
}

/**
 * Eine Aktivenabrechnung mit genau sieben Positionen.
 *
 * Ungültige Eingaben werfen nie; sie werden auf einen Standardwert
 * zurückgesetzt. Die `set…`-Methoden melden per Rückgabewert, ob die
 * Eingabe unverändert übernommen wurde.
 */
export class Abrechnung {
  readonly positions: Positions = createPositions();

  private _user = { name: "", group: "" };
  private _project: { name: string; date: Date | null } = { name: "", date: null };
  private _donations = 0;
  private _payment: {
    ibanmode: IbanMode | null;
    sepamode: SepaMode | null;
    ibanknown: boolean;
    iban: string;
    name: string;
  } = { ibanmode: null, sepamode: null, ibanknown: false, iban: "", name: "" };

  /* ---------- Aktive:r ---------- */
  get username(): string {
    return this._user.name;
  }
  set username(value: string) {
    this._user.name = String(value);
  }

  /** Arbeitsbereich */
  get usergroup(): string {
    return this._user.group;
  }
  set usergroup(value: string) {
    this._user.group = String(value);
  }

  /* ---------- Aktion / Projekt ---------- */
  get projectname(): string {
    return this._project.name;
  }
  set projectname(value: string) {
    this._project.name = String(value);
  }

  get projectdate(): Date | null {
    return this._project.date;
  }
  set projectdate(value: Date | string | null) {
    this.setProjectdate(value);
  }

  /** Akzeptiert Date-Objekte oder Strings im Format Jahr-Monat-Tag. */
  setProjectdate(value: Date | string | null): boolean {
    if (value instanceof Date) {
      this._project.date = Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
    } else if (value === null) {
      this._project.date = null;
      return true;
    } else {
      this._project.date = parseIsoDate(value);
    }
    return this._project.date !== null;
  }

  /* ---------- Spenden ---------- */
  get donations(): number {
    return this._donations;
  }
  set donations(value: number) {
    this.setDonations(value);
  }

  setDonations(value: number): boolean {
    this._donations = Number.isFinite(value) && value > 0 ? value : 0;
    return this._donations === value;
  }

  /* ---------- Summen ---------- */
  get income(): number {
    return this.positions.reduce((sum, p) => sum + p.income, 0) + this._donations;
  }

  get cost(): number {
    return this.positions.reduce((sum, p) => sum + p.cost, 0);
  }

  /** Einnahmen minus Ausgaben der Positionen, ohne Spenden. */
  get total(): number {
    return this.positions.reduce((sum, p) => sum + p.value, 0);
  }

  /* ---------- Zahlungsdaten ---------- */
  get accountname(): string {
    return this._payment.name;
  }
  set accountname(value: string) {
    this._payment.name = String(value);
  }

  /** IBAN ohne führendes "DE", mit Leerzeichen in Viererblöcken. */
  get iban(): string {
    return this.getIban(true);
  }
  set iban(value: string) {
    this.setIban(value);
  }

  getIban(spaces = true): string {
    let out = this._payment.iban;
    if (spaces && out.length > IBAN_SPACES[0]) {
      for (const i of IBAN_SPACES) out = out.slice(0, i) + " " + out.slice(i);
    }
    return out;
  }

  /** Nur genau 20 Ziffern (Leerzeichen werden entfernt), sonst leer. */
  setIban(value: string): boolean {
    const digits = String(value).replace(/ /g, "");
    const ok = digits.length === IBAN_LENGTH && /^[0-9]+$/.test(digits);
    this._payment.iban = ok ? digits : "";
    return ok || digits === "";
  }

  get ibanValid(): boolean {
    return this._payment.iban.length === IBAN_LENGTH;
  }

  get ibanmode(): IbanMode | null {
    return this._payment.ibanmode;
  }
  set ibanmode(mode: ModeInput) {
    this.setIbanmode(mode);
  }

  setIbanmode(mode: ModeInput): boolean {
    const n = isUnset(mode) ? null : toInt(mode);
    this._payment.ibanmode = isIbanMode(n) ? n : null;
    return this._payment.ibanmode !== null || isUnset(mode);
  }

  get sepamode(): SepaMode | null {
    return this._payment.sepamode;
  }
  set sepamode(mode: ModeInput) {
    this.setSepamode(mode);
  }

  setSepamode(mode: ModeInput): boolean {
    const n = isUnset(mode) ? null : toInt(mode);
    this._payment.sepamode = isSepaMode(n) ? n : null;
    return this._payment.sepamode !== null || isUnset(mode);
  }

  /** Ob die IBAN dem Verein schon vorliegt. */
  get ibanknown(): boolean {
    return this._payment.ibanknown;
  }
  set ibanknown(value: boolean) {
    this._payment.ibanknown = Boolean(value);
  }

  /* ---------- Ausgabe ---------- */
  /** Summenzeilen in der Reihenfolge des Formulars, Beträge mit Vorzeichen. */
  sums(): Array<[string, string]> {
    return [
      ["Spenden", euro(this.donations, true)],
      ["Einnahmen gesamt", euro(this.income, true)],
      ["Ausgaben gesamt", euro(this.cost, true)],
      ["Ergebnis", euro(this.total, true)],
    ];
  }

  /** Ankreuzfelder der Zahlungsdaten in der Reihenfolge des Formulars. */
  paymentOptions(): Array<[string, boolean]> {
    const { ibanmode, sepamode, ibanknown } = this._payment;
    return [
      ["Ausgaben bitte auf das oben genannte Konto überweisen", ibanmode === 1],
      ["Einnahmen bitte von dem oben genannten Konto abbuchen", ibanmode === 2],
      ["Einnahmen werden von mir überwiesen", ibanmode === 3],
      ["Die IBAN liegt bereits vor", ibanknown],
      ["SEPA-Mandat liegt noch nicht vor, bitte Formular zusenden", sepamode === 2],
      ["SEPA-Mandat ist veraltet, bitte Formular zusenden", sepamode === 3],
    ];
  }

  isEmpty(): boolean {
    return this.positions.every((p) => p.isEmpty()) && !(this._donations > 0);
  }

  /** Dateiname ohne Endung, z. B. "Aktivenabrechnung_sommerfest_2024-05-01_kim-muster". */
  suggestFilename(): string {
    return [
      "Aktivenabrechnung",
      slugifyLocal(this.projectname),
      formatIsoDate(this.projectdate),
      slugifyLocal(this.username),
    ]
      .filter(Boolean)
      .join("_");
  }

  toString(): string {
    return euro(this.total);
  }
}
