// src/services/aktive/position.ts
import { cell, escapeHtml, euro } from "../../lib/format";

export type PositionInit = {
  name?: string;
  unitcount?: number;
  unitprice?: number;
  value?: number;
};

function finiteOrZero(n: number) {
  return Number.isFinite(n) ? n : 0;
}

/**
 * Eine Position (Einnahme oder Ausgabe) einer Aktivenabrechnung.
 *
 * Ist ein Stückpreis gesetzt, ergibt sich der Gesamtwert aus
 * Stückpreis × Anzahl; der gespeicherte Gesamtwert wird dann ignoriert.
 */
export class Position {
  private _name = "";
  private _unitcount = 1;
  private _unitprice = 0;
  private _value = 0;

  constructor(init: PositionInit = {}) {
    this.name = init.name ?? "";
    this.setUnitcount(init.unitcount ?? 1);
    this.unitprice = init.unitprice ?? 0;
    this.value = init.value ?? 0;
  }

  get name(): string {
    return this._name;
  }
  set name(value: string) {
    this._name = String(value);
  }

  get unitcount(): number {
    return this._unitcount;
  }
  set unitcount(value: number) {
    this.setUnitcount(value);
  }

  /** Anzahl < 1 (oder keine Zahl) wird auf 1 korrigiert. */
  setUnitcount(value: number): boolean {
    const count = Number.isFinite(value) ? Math.trunc(value) : 1;
    this._unitcount = count < 1 ? 1 : count;
    return this._unitcount === value;
  }

  get unitprice(): number {
    return this._unitprice;
  }
  set unitprice(value: number) {
    this._unitprice = finiteOrZero(value);
  }

  /** Einnahmen positiv, Ausgaben negativ. */
  get value(): number {
    if (this._unitprice !== 0) return this._unitprice * this._unitcount;
    return this._value;
  }
  set value(value: number) {
    this._value = finiteOrZero(value);
  }

  /** Setzt den Gesamtwert mit umgekehrtem Vorzeichen (Ausgaben positiv). */
  setMinusValue(value: number) {
    this._value = finiteOrZero(value) * -1;
  }

  get income(): number {
    return Math.max(0, this.value);
  }
  set income(value: number) {
    this.value = value;
  }

  get cost(): number {
    return Math.max(0, this.value * -1);
  }
  set cost(value: number) {
    this.setMinusValue(value);
  }

  isEmpty(): boolean {
    return this._name === "" && this._unitprice === 0 && this._value === 0;
  }

  /** Name, Anzahl (leer ohne Stückpreis), Stückpreis, Einnahmen, Ausgaben. */
  cells(): string[] {
    return [
      this._name,
      this._unitprice ? String(this._unitcount) : "",
      euro(Math.abs(this._unitprice), true),
      euro(this.income, true),
      euro(this.cost, true),
    ];
  }

  /**
   * Fünf HTML-Zellen: Name, Anzahl, Stückpreis, Einnahmen, Ausgaben.
   * Jede Zelle steht in einer eigenen Zeile, außer `indent` ist negativ.
   */
  htmlcells(indent = 0): string {
    const tabs = "\t".repeat(Math.max(indent, 0));
    const joiner = indent < 0 ? "" : "\n" + tabs;

    const [name, ...rest] = this.cells();
    const out = [cell(escapeHtml(name)), ...rest.map((c) => cell(c))];

    return tabs + out.join(joiner);
  }

  toString(): string {
    return euro(this.value);
  }
}
