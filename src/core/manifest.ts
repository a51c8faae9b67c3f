/**
 * @fileoverview Decoding of declaration manifests: the JSON documents in
 * which a source extractor describes the declarations of a file.
 *
 * @module core/manifest
 *
 * @example
 * {
 *   "path": "shapes.py",
 *   "declarations": [{
 *     "kind": "function",
 *     "name": "area",
 *     "start": { "line": 1, "column": 1 },
 *     "end": { "line": 4, "column": 20 },
 *     "parameters": [{ "name": "radius", "start": { "line": 1, "column": 10 }, "end": { "line": 1, "column": 16 } }],
 *     "returns": 1,
 *     "docstring": {
 *       "text": "Compute the area.",
 *       "start": { "line": 2, "column": 5 },
 *       "end": { "line": 2, "column": 28 },
 *       "indent": 4
 *     }
 *   }]
 * }
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { AsyncResult, Result } from '../types/base.js';
import type { FileManifest } from '../types/declaration.js';
import { err, ok } from '../utils/result.js';

// ============================================================
// Types
// ============================================================

/**
 * Error types for manifest operations.
 */
export type ManifestError =
    | { readonly type: 'io'; readonly message: string }
    | { readonly type: 'parse'; readonly message: string }
    | { readonly type: 'validation'; readonly message: string };

// ============================================================
// Schemas
// ============================================================

const PositionSchema = z.object({
    line: z.number().int().min(1),
    column: z.number().int().min(1),
});

const SpanShape = {
    start: PositionSchema,
    end: PositionSchema,
};

const RawDocstringSchema = z.object({
    ...SpanShape,
    text: z.string(),
    indent: z.number().int().min(0).default(0),
    delimiter: z.string().min(1).default('"""'),
});

const DeclaredParameterSchema = z.object({
    ...SpanShape,
    name: z.string().min(1),
    default: z.string().nullable().default(null),
    annotation: z.string().nullable().default(null),
    arity: z.enum(['positional', 'varargs', 'kwargs']).default('positional'),
});

const DeclarationShape = {
    ...SpanShape,
    docstring: RawDocstringSchema.nullable().default(null),
    noqa: z.array(z.string()).default([]),
};

const Count = z.number().int().min(0).default(0);

const CallableShape = {
    ...DeclarationShape,
    name: z.string().min(1),
    parameters: z.array(DeclaredParameterSchema).default([]),
    returns: Count,
    yields: Count,
    raises: Count,
};

const DeclarationSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('module'), ...DeclarationShape }),
    z.object({
        kind: z.literal('class'),
        ...DeclarationShape,
        name: z.string().min(1),
        parameters: z.array(DeclaredParameterSchema).default([]),
    }),
    z.object({ kind: z.literal('function'), ...CallableShape }),
    z.object({ kind: z.literal('method'), ...CallableShape }),
    z.object({ kind: z.literal('constant'), ...DeclarationShape, name: z.string().min(1) }),
]);

const FileManifestSchema = z.object({
    path: z.string().min(1),
    source: z.string().nullable().default(null),
    declarations: z.array(DeclarationSchema),
});

// ============================================================
// Decoding
// ============================================================

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validates an already parsed JSON value.
 */
export function decodeManifest(value: unknown): Result<FileManifest, ManifestError> {
    const parsed = FileManifestSchema.safeParse(value);
    if (!parsed.success) {
        return err({ type: 'validation', message: `Invalid manifest: ${formatIssues(parsed.error)}` });
    }
    return ok(parsed.data);
}

/**
 * Parses and validates manifest JSON text.
 */
export function parseManifest(json: string): Result<FileManifest, ManifestError> {
    let value: unknown;
    try {
        value = JSON.parse(json);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'parse', message: `Invalid JSON in manifest: ${message}` });
    }
    return decodeManifest(value);
}

/**
 * Reads a manifest file from disk.
 */
export async function readManifest(file: string): AsyncResult<FileManifest, ManifestError> {
    let json: string;
    try {
        json = await readFile(file, 'utf-8');
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'io', message: `Failed to read manifest ${file}: ${message}` });
    }
    return parseManifest(json);
}
