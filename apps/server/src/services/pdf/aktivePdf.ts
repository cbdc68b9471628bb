// src/services/pdf/aktivePdf.ts
import PDFDocument from "pdfkit";
import { Abrechnung, POSITION_COUNT, formatIsoDate } from "../aktive/abrechnung";

/* ======================
   Layout (A4, 40pt Rand)
====================== */
const LEFT = 40;
const RIGHT = 555;

// Spalten wie in der HTML-Vorlage: Nr, Bezeichnung, Anzahl, Stückpreis, Einnahmen, Ausgaben, Beleg, Konto
const COLS = [
  { title: "Nr.", x: 40, w: 25, align: "left" },
  { title: "Bezeichnung", x: 68, w: 150, align: "left" },
  { title: "Anzahl", x: 220, w: 40, align: "right" },
  { title: "Stückpreis", x: 264, w: 65, align: "right" },
  { title: "Einnahmen", x: 333, w: 65, align: "right" },
  { title: "Ausgaben", x: 402, w: 65, align: "right" },
  { title: "Beleg", x: 471, w: 40, align: "left" },
  { title: "Konto", x: 515, w: 40, align: "left" },
] as const;

const BOX = { false: "[ ]", true: "[x]" } as const;

function box(checked: boolean) {
  return checked ? BOX.true : BOX.false;
}

function hr(doc: PDFKit.PDFDocument, color = "#ddd", y?: number) {
  const yy = y ?? doc.y;
  doc.moveTo(LEFT, yy).lineTo(RIGHT, yy).strokeColor(color).stroke();
}

function field(doc: PDFKit.PDFDocument, label: string, value: string, x: number, y: number, w: number) {
  doc.fontSize(8).fillColor("#555").text(label, x, y, { width: w });
  doc.fontSize(11).fillColor("#000").text(value || " ", x, y + 10, { width: w });
  doc.moveTo(x, y + 25).lineTo(x + w, y + 25).strokeColor("#aaa").stroke();
}

function row(doc: PDFKit.PDFDocument, cells: readonly string[], y: number) {
  COLS.forEach((c, i) => {
    doc.text(cells[i] ?? "", c.x, y, { width: c.w, align: c.align, lineBreak: false });
  });
}

function positionCells(a: Abrechnung | null, index: number): string[] {
  const nr = String(index + 1);
  return a ? [nr, ...a.positions[index].cells()] : [nr];
}

// Beschriftungen des leeren Formulars
const BLANK = new Abrechnung();

function draw(doc: PDFKit.PDFDocument, a: Abrechnung | null) {
  doc.fontSize(18).text("Aktivenabrechnung", LEFT, 40);
  doc.moveDown(0.2).fontSize(10).fillColor("#444")
    .text("Abrechnung von Einnahmen und Ausgaben für Aktionen und Projekte");
  doc.fillColor("#000").moveDown(0.5);
  hr(doc);

  /* ---- Aktive:r / Projekt ---- */
  let y = doc.y + 12;
  field(doc, "Name", a?.username ?? "", LEFT, y, 250);
  field(doc, "Arbeitsbereich", a?.usergroup ?? "", 305, y, 250);
  y += 36;
  field(doc, "Aktion / Projekt", a?.projectname ?? "", LEFT, y, 250);
  field(doc, "Datum", a ? formatIsoDate(a.projectdate) : "", 305, y, 250);

  /* ---- Positionen ---- */
  y += 48;
  doc.fontSize(9).fillColor("#000");
  row(doc, COLS.map((c) => c.title), y);
  y += 14;
  hr(doc, "#aaa", y);
  y += 5;
  for (let i = 0; i < POSITION_COUNT; i++) {
    row(doc, positionCells(a, i), y);
    y += 16;
    hr(doc, "#eee", y - 3);
  }

  /* ---- Summen ---- */
  y += 8;
  doc.fontSize(10);
  for (const [label, value] of (a ?? BLANK).sums()) {
    doc.text(label, 264, y, { width: 130 });
    doc.text(a ? value : "", 402, y, { width: 100, align: "right" });
    y += 15;
  }

  /* ---- Zahlungsdaten ---- */
  y += 12;
  hr(doc, "#ddd", y);
  y += 10;
  doc.fontSize(12).text("Zahlung", LEFT, y);
  y += 20;
  field(doc, "Kontoinhaber:in", a?.accountname ?? "", LEFT, y, 250);
  const iban = a ? a.getIban(true) : "";
  field(doc, "IBAN", `DE${iban}`, 305, y, 250);
  y += 36;

  doc.fontSize(10);
  for (const [label, checked] of (a ?? BLANK).paymentOptions()) {
    doc.text(`${box(checked)} ${label}`, LEFT, y);
    y += 15;
  }

  /* ---- Unterschriften ---- */
  y += 40;
  doc.moveTo(60, y).lineTo(240, y).stroke("#ccc");
  doc.moveTo(320, y).lineTo(500, y).stroke("#ccc");
  doc.fontSize(9).fillColor("#555");
  doc.text("Datum, Unterschrift Aktive:r", 60, y + 5, { width: 180, align: "center" });
  doc.text("Geprüft (Geschäftsstelle)", 320, y + 5, { width: 180, align: "center" });
  doc.fillColor("#000");
}

/** Rendert eine Abrechnung (oder ohne Abrechnung das leere Formular) als PDF. */
export function renderAktivePdf(abrechnung: Abrechnung | null): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({
      margin: 40,
      size: "A4",
      info: { Title: abrechnung ? abrechnung.suggestFilename() : "Aktivenabrechnung" },
    });
    const chunks: Buffer[] = [];
    doc.on("data", (c: Buffer) => chunks.push(c));
    doc.on("end", () => resolve(Buffer.concat(chunks)));
    doc.on("error", reject);

    try {
      draw(doc, abrechnung);
    } catch (e) {
      reject(e);
    }
    doc.end();
  });
}
