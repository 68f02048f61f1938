import express, { Response } from "express";
import { Server } from "node:http";
import { combineCards } from "./combine.js";
import { AppConfig } from "./config.js";
import { CardError, TranslationServiceError, UnknownSampleError } from "./errors.js";
import { buildSample, listSamples } from "./samples.js";
import { TranslationService } from "./translator.js";
import { SerializeOverrides } from "./types.js";
import { errorMessage, isRecord, isStringArray } from "./utils.js";

export interface ServerOptions {
    translator?: TranslationService;
    card?: Partial<AppConfig["card"]>;
}

function statusFor(err: unknown): number {
    if (err instanceof UnknownSampleError) return 404;
    if (err instanceof TranslationServiceError) return 502;
    if (err instanceof CardError) return 400;
    return 500;
}

function sendError(res: Response, err: unknown): void {
    const body: Record<string, unknown> = { error: errorMessage(err) };
    if (err instanceof UnknownSampleError) {
        body.available = err.available;
    }
    res.status(statusFor(err)).json(body);
}

function queryString(value: unknown): string | undefined {
    return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function createApp(options: ServerOptions = {}) {
    const app = express();
    const defaults: SerializeOverrides = { schema: options.card?.schema, version: options.card?.version };

    app.use(express.json({ limit: "1mb" }));

    /** List the sample cards */
    app.get("/api/samples", (_req, res) => {
        res.json({ samples: listSamples() });
    });

    /** Render one sample card */
    app.get("/api/samples/:name", (req, res) => {
        try {
            const overrides: SerializeOverrides = {
                schema: queryString(req.query.schema) ?? defaults.schema,
                version: queryString(req.query.version) ?? defaults.version,
            };
            const card = buildSample(req.params.name, overrides);
            res.json(card.toDocument());
        } catch (err) {
            sendError(res, err);
        }
    });

    /** Render one sample card translated into `language` */
    app.post("/api/samples/:name/translate", async (req, res) => {
        try {
            const body: unknown = req.body;
            const language = isRecord(body) && typeof body.language === "string" ? body.language.trim() : "";

            if (!language) {
                res.status(400).json({ error: "Missing 'language'." });
                return;
            }

            if (!options.translator) {
                res.status(503).json({ error: "Translation is not configured. Set TRANSLATOR_PROVIDER." });
                return;
            }

            const card = buildSample(req.params.name, defaults);
            const translated = await card.translate(language, options.translator);
            res.json({ language, translated, card: card.toDocument() });
        } catch (err) {
            sendError(res, err);
        }
    });

    /** Combine several samples into one card */
    app.post("/api/combine", (req, res) => {
        try {
            const body: unknown = req.body;
            const names = isRecord(body) ? body.samples : undefined;

            if (!isStringArray(names) || names.length === 0) {
                res.status(400).json({ error: "Provide 'samples' as a non-empty array of sample names." });
                return;
            }

            const combined = combineCards(names.map((name) => buildSample(name, defaults)));
            res.json(combined.toDocument());
        } catch (err) {
            sendError(res, err);
        }
    });

    return app;
}

export function createServer(port: number, options: ServerOptions = {}): Server {
    const app = createApp(options);

    return app.listen(port, () => {
        console.log(`\n  🃏 Cardsmith preview server`);
        console.log(`  ────────────────────────────────`);
        console.log(`  Samples:  http://localhost:${port}/api/samples`);
        console.log(`  Translation: ${options.translator ? "enabled" : "disabled"}`);
        console.log(`  Press Ctrl+C to stop.\n`);
    });
}
