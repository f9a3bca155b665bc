import { readFile } from "fs/promises";
import * as path from "path";
import pLimit from "p-limit";
import { isText } from "istextorbinary";
import { ExtractionError } from "./errors.js";

/** A document reduced to text. `text` is empty when extraction failed. */
export interface LoadedDocument {
    name: string;
    text: string;
}

/**
 * Decodes one container format (PDF, DOCX, ...) into text, optionally with
 * `[PAGE n]` markers at page boundaries in reading order.
 */
export interface TextExtractor {
    extract(content: Buffer, fileName: string): Promise<string>;
}

const PLAIN_TEXT_EXTENSIONS = new Set([".txt", ".text", ".md", ".markdown"]);

/**
 * Loads a batch of files as text. A file that cannot be read or decoded is
 * logged and comes back with empty text so the rest of the batch still loads.
 */
export class DocumentLoader {
    private readonly extractors = new Map<string, TextExtractor>();

    /**
     * @param maxConcurrency The maximum number of files read at once.
     */
    constructor(private readonly maxConcurrency: number = 5) {
        if (!Number.isInteger(maxConcurrency) || maxConcurrency <= 0) {
            throw new Error(`Loader concurrency must be a positive integer, got ${maxConcurrency}.`);
        }
    }

    /** Registers an extractor for a file extension such as ".pdf". */
    registerExtractor(extension: string, extractor: TextExtractor): this {
        this.extractors.set(extension.toLowerCase(), extractor);
        return this;
    }

    /**
     * Decodes one file's content.
     * @throws ExtractionError if the file is binary or no extractor handles its extension.
     */
    async extractText(content: Buffer, fileName: string): Promise<string> {
        const extension = path.extname(fileName).toLowerCase();
        const extractor = this.extractors.get(extension);
        if (extractor) {
            return extractor.extract(content, fileName);
        }
        if (!PLAIN_TEXT_EXTENSIONS.has(extension)) {
            throw new ExtractionError(fileName, `unsupported file type '${extension || "(none)"}'`);
        }
        if (isText(null, content) === false) {
            throw new ExtractionError(fileName, "file appears to be binary");
        }
        return content.toString("utf8");
    }

    /** Reads and decodes one file, degrading to empty text on any failure. */
    async loadFile(filePath: string): Promise<LoadedDocument> {
        const name = path.basename(filePath);
        try {
            const content = await readFile(filePath);
            const text = await this.extractText(content, name);
            console.log(`Extracted ${text.length} chars from ${name}.`);
            return { name, text };
        } catch (error) {
            const errorMessage = error instanceof Error ? error.message : String(error);
            console.error(`Error extracting ${name}: ${errorMessage}`);
            return { name, text: "" };
        }
    }

    /**
     * Loads files concurrently.
     * @returns One document per path, in input order.
     */
    async loadFiles(filePaths: readonly string[]): Promise<LoadedDocument[]> {
        console.log(`Loading ${filePaths.length} files with concurrency limit of ${this.maxConcurrency}...`);
        const limit = pLimit(this.maxConcurrency);
        const documents = await Promise.all(filePaths.map(filePath => limit(() => this.loadFile(filePath))));

        const withContent = documents.filter(document => document.text.trim().length > 0).length;
        console.log(`Loaded text from ${withContent} of ${filePaths.length} files.`);
        return documents;
    }
}
