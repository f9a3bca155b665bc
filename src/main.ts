#!/usr/bin/env node
import dotenv from "dotenv";
import { writeFile } from "fs/promises";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { DocumentFinder } from "./documentFinder.js";
import { DocumentLoader } from "./documentLoader.js";
import { EmbeddingService } from "./embeddingService.js";
import { loadFinderConfig } from "./finderConfig.js";
import { formatExportMarkdown, formatExportText, highlightQuery } from "./resultFormatter.js";

dotenv.config();

const PREVIEW_LENGTH = 600;

function parsePositiveInt(name: string, fallback: string, allowZero = false): number {
    const value = parseInt(process.env[name] ?? fallback, 10);
    if (isNaN(value) || value < 0 || (!allowZero && value === 0)) {
        throw new Error(`${name} must be a ${allowZero ? "non-negative" : "positive"} integer.`);
    }
    return value;
}

/**
 * Command-line entry point: `main <query> <file...>`.
 * Loads the files, builds the hybrid index, prints the best passages and
 * optionally writes them to an export file.
 */
async function main() {
    try {
        const [query, ...filePaths] = process.argv.slice(2);
        if (!query || filePaths.length === 0) {
            throw new Error("Usage: passage-finder <query> <file...>");
        }

        console.log("Loading configuration from environment variables...");
        const requiredEnvVars = ["EMBEDDING_PROVIDER_NAME", "EMBEDDING_PROVIDER_BASE_URL", "EMBEDDING_MODEL"];
        for (const varName of requiredEnvVars) {
            if (!process.env[varName]) {
                throw new Error(`Missing required environment variable: ${varName}`);
            }
        }

        const finderConfig = loadFinderConfig(process.env);
        const embeddingBatchSize = parsePositiveInt("EMBEDDING_BATCH_SIZE", "32");
        const embeddingApiDelayMs = parsePositiveInt("EMBEDDING_API_DELAY_MS", "0", true);
        const maxConcurrentLoads = parsePositiveInt("MAX_CONCURRENT_LOADS", "5");
        const exportFormat = process.env.EXPORT_FORMAT;
        if (exportFormat && exportFormat !== "text" && exportFormat !== "markdown") {
            throw new Error("EXPORT_FORMAT must be one of 'text', 'markdown'.");
        }
        console.log("Configuration loaded successfully.");

        // The model handle is created once and shared by indexing and every query.
        const embeddingProvider = createOpenAICompatible({
            name: process.env.EMBEDDING_PROVIDER_NAME ?? "",
            baseURL: process.env.EMBEDDING_PROVIDER_BASE_URL ?? "",
            apiKey: process.env.EMBEDDING_PROVIDER_API_KEY || undefined,
        });
        const embeddingModel = embeddingProvider.textEmbeddingModel(process.env.EMBEDDING_MODEL ?? "");
        const embeddingService = new EmbeddingService(embeddingModel, embeddingBatchSize, embeddingApiDelayMs);

        const loader = new DocumentLoader(maxConcurrentLoads);
        const documents = await loader.loadFiles(filePaths);

        const finder = new DocumentFinder(embeddingService, finderConfig);
        finder.setDocuments(documents);
        const results = await finder.search(query);

        if (results.length === 0) {
            console.log("No results found. Try different keywords.");
        }
        for (const result of results) {
            const preview = result.text.length > PREVIEW_LENGTH ? `${result.text.slice(0, PREVIEW_LENGTH)}...` : result.text;
            console.log(`\nResult ${result.rank}  ${result.confidence}% match (${result.band})`);
            console.log(`  ${result.source ?? "Multiple files"} | Page ~${result.page} | Score: ${result.score.toFixed(3)}`);
            console.log(`  ${highlightQuery(preview, query)}`);
        }

        if (exportFormat) {
            const extension = exportFormat === "markdown" ? "md" : "txt";
            const exportPath = process.env.EXPORT_PATH || `search_results_${query.replace(/ /g, "_")}.${extension}`;
            const content = exportFormat === "markdown"
                ? formatExportMarkdown(results, query, finder.fileNames)
                : formatExportText(results, query, finder.fileNames);
            await writeFile(exportPath, content, "utf-8");
            console.log(`\nExported ${results.length} results to ${exportPath}`);
        }
    } catch (error) {
        console.error("FATAL ERROR during search:", error);
        process.exit(1);
    }
}

await main();
