import fs from 'fs';
import path from 'path';
import config from './index';
import { Platform, isPlatform } from '../types';

// category -> platform -> ordered tags
export type CuratedTable = Record<string, Partial<Record<Platform, string[]>>>;

export interface CategoryDefinition {
    subcategories: string[];
    keywords: string[];
}

export type CategoryTaxonomy = Record<string, CategoryDefinition>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function readJson(fileName: string): unknown {
    const file = path.join(config.app.dataDir, fileName);
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

export function parseCuratedTable(data: unknown): CuratedTable {
    if (!isRecord(data)) {
        throw new Error('Curated hashtag table must be an object');
    }

    const table: CuratedTable = {};
    for (const [category, platforms] of Object.entries(data)) {
        if (!isRecord(platforms)) {
            throw new Error(`Curated entry "${category}" must map platforms to tag lists`);
        }

        const entry: Partial<Record<Platform, string[]>> = {};
        for (const [platform, tags] of Object.entries(platforms)) {
            if (!isStringArray(tags)) {
                throw new Error(`Curated entry "${category}.${platform}" must be a list of strings`);
            }
            if (isPlatform(platform)) {
                entry[platform] = tags;
            }
        }
        table[category.toLowerCase()] = entry;
    }

    return table;
}

export function parseCategoryTaxonomy(data: unknown): CategoryTaxonomy {
    if (!isRecord(data)) {
        throw new Error('Category taxonomy must be an object');
    }

    const taxonomy: CategoryTaxonomy = {};
    for (const [category, definition] of Object.entries(data)) {
        if (!isRecord(definition) || !isStringArray(definition.subcategories) || !isStringArray(definition.keywords)) {
            throw new Error(`Category "${category}" needs subcategories and keywords lists`);
        }
        taxonomy[category.toLowerCase()] = {
            subcategories: definition.subcategories,
            keywords: definition.keywords.map(k => k.toLowerCase()),
        };
    }

    return taxonomy;
}

let curatedTable: CuratedTable | null = null;
let categoryTaxonomy: CategoryTaxonomy | null = null;

export function loadCuratedTable(): CuratedTable {
    if (!curatedTable) {
        curatedTable = parseCuratedTable(readJson('curated-hashtags.json'));
    }
    return curatedTable;
}

export function loadCategoryTaxonomy(): CategoryTaxonomy {
    if (!categoryTaxonomy) {
        categoryTaxonomy = parseCategoryTaxonomy(readJson('categories.json'));
    }
    return categoryTaxonomy;
}

export function categoryKeywords(taxonomy: CategoryTaxonomy, category: string): string[] {
    return taxonomy[category.toLowerCase()]?.keywords ?? [];
}
