// src/services/aktive/htmlPrinter.ts
import fs from "fs";
import { cell, escapeHtml } from "../../lib/format";
import { Abrechnung, POSITION_COUNT, formatIsoDate } from "./abrechnung";

/* ===== Markierungen der HTML-Vorlage =====
 * Format der Vorlage, Version 1:
 *   <!--SPLIT-->\n        trennt Sektionen
 *   <!--KEYWORD-->\n      am Anfang einer Sektion (USERDATA, POSITIONS, TOTAL, PAYMENT)
 *   <!--PLACEHOLDER-->    Stelle, an der ein Wert eingesetzt wird
 */
export const SPLIT = "<!--SPLIT-->\n";
export const PLACEHOLDER = "<!--PLACEHOLDER-->";

export const SECTION_KINDS = ["USERDATA", "POSITIONS", "TOTAL", "PAYMENT"] as const;
export type SectionKind = (typeof SECTION_KINDS)[number];

export type Section =
  | { kind: SectionKind; text: string }
  | { kind: "PLAIN"; text: string };

const CHECKBOX = { false: "&#9744;", true: "&#9746;" } as const;

const TAB = "\t";
const NL = "\n";

function checkbox(checked: boolean) {
  return checked ? CHECKBOX.true : CHECKBOX.false;
}

export function parseSection(section: string): Section {
  for (const kind of SECTION_KINDS) {
    const marker = `<!--${kind}-->\n`;
    if (section.startsWith(marker)) {
      return { kind, text: section.slice(marker.length) };
    }
  }
  return { kind: "PLAIN", text: section };
}

/** Hängt `values[i]` an das i-te Segment und fügt alles wieder zusammen. */
function fillPlaceholders(text: string, values: readonly string[] | null) {
  const segments = text.split(PLACEHOLDER);
  if (values) {
    values.forEach((v, i) => {
      if (i < segments.length) segments[i] += v;
    });
  }
  return segments.join("");
}

/**
 * Liest eine HTML-Vorlage ein und erstellt daraus ausgefüllte
 * Abrechnungsformulare. Die Vorlage wird nur einmal gelesen.
 */
export class HtmlPrinter {
  private readonly template: readonly string[];

  /** Erwartet den Text der Vorlage; siehe `fromFile`. */
  constructor(text: string) {
    this.template = Object.freeze(text.split(SPLIT));
  }

  /** Zeilenenden CRLF werden beim Lesen zu LF. */
  static fromFile(file: string): HtmlPrinter {
    return new HtmlPrinter(fs.readFileSync(file, "utf8").replace(/\r\n/g, "\n"));
  }

  get sections(): readonly string[] {
    return this.template;
  }

  /** Füllt die Vorlage mit einer Abrechnung aus (oder leer, ohne Abrechnung). */
  htmlCompose(input: Abrechnung | null = null): string {
    let out = "";
    for (const raw of this.template) {
      const section = parseSection(raw);
      switch (section.kind) {
        case "USERDATA":
          out += this.fillUser(section.text, input);
          break;
        case "POSITIONS":
          out += this.fillPositions(input);
          break;
        case "TOTAL":
          out += this.fillTotal(section.text, input);
          break;
        case "PAYMENT":
          out += this.fillPayment(section.text, input);
          break;
        case "PLAIN":
          out += section.text;
          break;
      }
    }
    return out;
  }

  private fillUser(text: string, input: Abrechnung | null) {
    return fillPlaceholders(
      text,
      input && [
        escapeHtml(input.username),
        escapeHtml(input.usergroup),
        escapeHtml(input.projectname),
        formatIsoDate(input.projectdate),
      ]
    );
  }

  /**
   * Sieben Tabellenreihen mit je 8 Spalten:
   * Index (1–7), Position.htmlcells() und zwei leere Zellen.
   * Der Text der Sektion wird ignoriert.
   */
  private fillPositions(input: Abrechnung | null) {
    const rows: string[] = [];

    for (let index = 0; index < POSITION_COUNT; index++) {
      let line = TAB.repeat(4) + "<tr>" + NL;
      line += TAB.repeat(5) + cell(String(index + 1)) + NL;

      if (input && index < input.positions.length) {
        line += input.positions[index].htmlcells(5) + NL;
        line += TAB.repeat(5) + cell().repeat(2) + NL;
      } else {
        line += TAB.repeat(5) + cell().repeat(7) + NL;
      }

      line += TAB.repeat(4) + "</tr>" + NL;
      rows.push(line);
    }

    return rows.join("");
  }

  private fillTotal(text: string, input: Abrechnung | null) {
    return fillPlaceholders(
      text,
      input && input.sums().map(([, value]) => value)
    );
  }

  private fillPayment(text: string, input: Abrechnung | null) {
    return fillPlaceholders(
      text,
      input && [
        escapeHtml(input.accountname),
        input.getIban(true),
        ...input.paymentOptions().map(([, checked]) => checkbox(checked)),
      ]
    );
  }

  toString(): string {
    return this.htmlCompose();
  }
}
