import Database from "better-sqlite3";
import { z } from "zod";
import * as path from "path";
import * as fs from "fs";
import { StorageUnavailableError } from "./errors";
import type { HiringType, Lead, LeadFilters, LeadQuality, LeadStats, NewLead, Platform } from "./types";

export const DEFAULT_DB_PATH = path.join(process.cwd(), "data", "leads.db");

export interface UpsertResult {
	stored: boolean;
	leadId: string;
}

/** Durable keyed storage for qualified leads. */
export interface LeadStore {
	upsertIfNew(lead: NewLead): UpsertResult;
	has(leadId: string): boolean;
	get(leadId: string): Lead | undefined;
	list(filters?: LeadFilters): Lead[];
	dismiss(leadId: string): boolean;
	stats(): LeadStats;
	close(): void;
}

interface LeadRow {
	id: string;
	platform: Platform;
	post_id: string;
	post_url: string;
	content: string;
	author_name: string;
	author_handle: string;
	author_profile_url: string | null;
	author_title: string;
	author_company: string;
	posted_at: string | null;
	matched_keywords: string;
	matched_job_titles: string;
	matched_industries: string;
	budget_mention: string | null;
	relevance_rationale: string;
	confidence: number | null;
	lead_quality: LeadQuality | null;
	hiring_type: HiringType | null;
	discovered_at: string;
	dismissed: number;
}

type InsertParams = Omit<LeadRow, "dismissed">;

const stringArray = z.array(z.string());

function parseTerms(json: string): string[] {
	let value: unknown;
	try {
		value = JSON.parse(json);
	} catch {
		return [];
	}
	const result = stringArray.safeParse(value);
	return result.success ? result.data : [];
}

function toLead(row: LeadRow): Lead {
	return {
		...row,
		matched_keywords: parseTerms(row.matched_keywords),
		matched_job_titles: parseTerms(row.matched_job_titles),
		matched_industries: parseTerms(row.matched_industries),
		dismissed: row.dismissed !== 0,
	};
}

function escapeLike(value: string): string {
	return value.replace(/[\\%_]/g, ch => `\\${ch}`);
}

export interface LeadStoreOptions {
	/** File path, or ":memory:" for a private in-memory database. */
	path?: string;
	now?: () => Date;
}

export class SqliteLeadStore implements LeadStore {
	private db: Database.Database | null;
	private readonly now: () => Date;

	constructor(options: LeadStoreOptions = {}) {
		const dbPath = options.path ?? DEFAULT_DB_PATH;
		this.now = options.now ?? (() => new Date());
		try {
			if (dbPath !== ":memory:") {
				fs.mkdirSync(path.dirname(dbPath), { recursive: true });
			}
			this.db = new Database(dbPath);
			this.db.pragma("journal_mode = WAL");
			this.initSchema(this.db);
		} catch (err) {
			throw new StorageUnavailableError("open", err);
		}
	}

	private initSchema(database: Database.Database): void {
		database.exec(`
			CREATE TABLE IF NOT EXISTS leads (
				id TEXT PRIMARY KEY,
				platform TEXT NOT NULL,
				post_id TEXT NOT NULL,
				post_url TEXT NOT NULL,
				content TEXT NOT NULL DEFAULT '',
				author_name TEXT NOT NULL DEFAULT '',
				author_handle TEXT NOT NULL DEFAULT '',
				author_profile_url TEXT,
				author_title TEXT NOT NULL DEFAULT '',
				author_company TEXT NOT NULL DEFAULT '',
				posted_at TEXT,
				matched_keywords TEXT NOT NULL DEFAULT '[]',
				matched_job_titles TEXT NOT NULL DEFAULT '[]',
				matched_industries TEXT NOT NULL DEFAULT '[]',
				budget_mention TEXT,
				relevance_rationale TEXT NOT NULL DEFAULT '',
				confidence REAL,
				lead_quality TEXT,
				hiring_type TEXT,
				discovered_at TEXT NOT NULL,
				dismissed INTEGER NOT NULL DEFAULT 0
			);

			CREATE INDEX IF NOT EXISTS idx_leads_discovered_at ON leads(discovered_at);
			CREATE INDEX IF NOT EXISTS idx_leads_platform ON leads(platform);
			CREATE INDEX IF NOT EXISTS idx_leads_dismissed ON leads(dismissed);
		`);
	}

	private run<T>(operation: string, fn: (database: Database.Database) => T): T {
		try {
			if (!this.db) throw new Error("database is closed");
			return fn(this.db);
		} catch (err) {
			throw new StorageUnavailableError(operation, err);
		}
	}

	upsertIfNew(lead: NewLead): UpsertResult {
		return this.run("upsert", database => {
			const stmt = database.prepare<InsertParams>(`
				INSERT INTO leads (
					id, platform, post_id, post_url, content, author_name, author_handle, author_profile_url,
					author_title, author_company, posted_at, matched_keywords, matched_job_titles, matched_industries,
					budget_mention, relevance_rationale, confidence, lead_quality, hiring_type, discovered_at
				)
				VALUES (
					@id, @platform, @post_id, @post_url, @content, @author_name, @author_handle, @author_profile_url,
					@author_title, @author_company, @posted_at, @matched_keywords, @matched_job_titles, @matched_industries,
					@budget_mention, @relevance_rationale, @confidence, @lead_quality, @hiring_type, @discovered_at
				)
				ON CONFLICT(id) DO NOTHING
			`);

			const info = stmt.run({
				...lead,
				matched_keywords: JSON.stringify(lead.matched_keywords),
				matched_job_titles: JSON.stringify(lead.matched_job_titles),
				matched_industries: JSON.stringify(lead.matched_industries),
				discovered_at: this.now().toISOString(),
			});
			return { stored: info.changes > 0, leadId: lead.id };
		});
	}

	has(leadId: string): boolean {
		return this.run("lookup", database => {
			const row = database.prepare<[string], { found: number }>("SELECT 1 AS found FROM leads WHERE id = ?").get(leadId);
			return row !== undefined;
		});
	}

	get(leadId: string): Lead | undefined {
		return this.run("lookup", database => {
			const row = database.prepare<[string], LeadRow>("SELECT * FROM leads WHERE id = ?").get(leadId);
			return row ? toLead(row) : undefined;
		});
	}

	list(filters: LeadFilters = {}): Lead[] {
		return this.run("list", database => {
			const clauses: string[] = [];
			const params: Array<string | number> = [];

			if (!filters.includeDismissed) {
				clauses.push("dismissed = 0");
			}
			if (filters.platform) {
				clauses.push("platform = ?");
				params.push(filters.platform);
			}

			const setFilters: Array<[keyof LeadRow, string | undefined]> = [
				["matched_keywords", filters.keyword],
				["matched_job_titles", filters.jobTitle],
				["matched_industries", filters.industry],
			];
			for (const [column, term] of setFilters) {
				if (!term?.trim()) continue;
				clauses.push(`EXISTS (SELECT 1 FROM json_each(leads.${column}) WHERE lower(json_each.value) = lower(?))`);
				params.push(term.trim());
			}

			if (filters.text?.trim()) {
				const pattern = `%${escapeLike(filters.text.trim().toLowerCase())}%`;
				clauses.push(`(
					lower(content) LIKE ? ESCAPE '\\'
					OR lower(author_name) LIKE ? ESCAPE '\\'
					OR lower(author_company) LIKE ? ESCAPE '\\'
				)`);
				params.push(pattern, pattern, pattern);
			}

			let sql = "SELECT * FROM leads";
			if (clauses.length > 0) sql += ` WHERE ${clauses.join(" AND ")}`;
			sql += " ORDER BY discovered_at DESC, rowid DESC";
			if (filters.limit && filters.limit > 0) {
				sql += " LIMIT ?";
				params.push(Math.floor(filters.limit));
			}

			return database.prepare<Array<string | number>, LeadRow>(sql).all(...params).map(toLead);
		});
	}

	/**
	 * Soft-hides a lead. Returns true only when a visible lead was hidden;
	 * an unknown or already dismissed id returns false.
	 */
	dismiss(leadId: string): boolean {
		return this.run("dismiss", database => {
			const info = database.prepare<[string]>("UPDATE leads SET dismissed = 1 WHERE id = ? AND dismissed = 0").run(leadId);
			return info.changes > 0;
		});
	}

	stats(): LeadStats {
		return this.run("stats", database => {
			const startOfDay = new Date(this.now().getTime());
			startOfDay.setHours(0, 0, 0, 0);
			const row = database.prepare<[string], { total: number; dismissed: number | null; today: number | null }>(`
				SELECT
					COUNT(*) AS total,
					SUM(dismissed) AS dismissed,
					SUM(CASE WHEN dismissed = 0 AND discovered_at >= ? THEN 1 ELSE 0 END) AS today
				FROM leads
			`).get(startOfDay.toISOString());

			const total = row?.total ?? 0;
			const dismissed = row?.dismissed ?? 0;
			return { total, visible: total - dismissed, dismissed, today: row?.today ?? 0 };
		});
	}

	close(): void {
		if (this.db) {
			this.db.close();
			this.db = null;
		}
	}
}
