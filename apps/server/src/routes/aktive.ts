// src/routes/aktive.ts
import fs from "fs";
import { Router, type Request } from "express";
import type { Config } from "../lib/config";
import { HttpError } from "../lib/httpError";
import { logger } from "../lib/logger";
import { Abrechnung } from "../services/aktive/abrechnung";
import { HtmlPrinter } from "../services/aktive/htmlPrinter";
import { aktiveQuerySchema, evaluateQuery } from "../services/aktive/query";
import { renderAktivePdf } from "../services/pdf/aktivePdf";

const BLANK_FILENAME = "Aktivenabrechnung.pdf";

/** Liest die Abrechnung aus dem Querystring; ohne Query gibt es null. */
function abrechnungFromQuery(req: Request): Abrechnung | null {
  if (Object.keys(req.query).length === 0) return null;

  const parsed = aktiveQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    throw new HttpError(400, "Querystring konnte nicht gelesen werden", parsed.error.issues);
  }

  const abrechnung = new Abrechnung();
  const corrected = evaluateQuery(abrechnung, parsed.data);
  if (corrected.length) {
    logger.warn({ rid: req.rid, corrected }, "Eingaben auf Standardwerte gesetzt");
  }
  return abrechnung;
}

export function createAktiveRouter(config: Config) {
  const router = Router();

  // Vorlagen werden einmal beim Start gelesen
  const printer = HtmlPrinter.fromFile(config.aktiveHtml);
  const css = fs.readFileSync(config.aktiveCss, "utf8");
  const form = fs
    .readFileSync(config.formHtml, "utf8")
    .replace(/<!--VERSION-->/g, config.version);

  /* ===== Formular ===== */
  router.get(["/", "/index"], (_req, res) => {
    res.type("html").send(form);
  });

  /* ===== GET /abrechnung (PDF) ===== */
  router.get("/abrechnung", async (req, res, next) => {
    try {
      const abrechnung = abrechnungFromQuery(req);
      const pdf = await renderAktivePdf(abrechnung);
      const filename = abrechnung ? abrechnung.suggestFilename() + ".pdf" : BLANK_FILENAME;
      res.setHeader("Content-Type", "application/pdf");
      res.setHeader("Content-Disposition", `attachment; filename="${filename}"`);
      res.send(pdf);
    } catch (e) {
      next(e);
    }
  });

  /* ===== GET /abrechnung.html (ausgefüllte HTML-Vorlage) ===== */
  router.get("/abrechnung.html", (req, res, next) => {
    try {
      const abrechnung = abrechnungFromQuery(req);
      const document = printer
        .htmlCompose(abrechnung)
        .replace("</head>", () => `<style>\n${css}</style>\n</head>`);
      res.type("html").send(document);
    } catch (e) {
      next(e);
    }
  });

  return router;
}
