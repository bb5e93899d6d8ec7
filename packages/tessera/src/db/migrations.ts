import type Database from 'better-sqlite3';

/**
 * Migration system using user_version pragma — no migration table needed.
 * Each migration is an array index: migration[0] upgrades from version 0 to 1, etc.
 */

type Migration = (db: Database.Database) => void;

const APPEND_ONLY = ['constraints', 'constraint_revisions', 'evidence', 'supersessions'] as const;

const migrations: Migration[] = [
  // Migration 001: v0 → v1 — Constraint registry (append-only)
  (db) => {
    db.exec(`
      CREATE TABLE registry_head (
        id INTEGER PRIMARY KEY CHECK(id = 1),
        version INTEGER NOT NULL
      );
      INSERT INTO registry_head (id, version) VALUES (1, 0);

      CREATE TABLE constraints (
        id TEXT PRIMARY KEY,
        seq INTEGER UNIQUE NOT NULL,
        statement TEXT NOT NULL,
        created_version INTEGER NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE constraint_revisions (
        constraint_id TEXT NOT NULL REFERENCES constraints(id),
        revision INTEGER NOT NULL,
        status TEXT NOT NULL CHECK(
          status IN ('PROPOSED', 'CONFIRMED', 'PARTIAL', 'FALSIFIED', 'SUPERSEDED')
        ),
        tier INTEGER NOT NULL CHECK(tier BETWEEN 0 AND 4),
        version INTEGER NOT NULL,
        reason TEXT NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (constraint_id, revision)
      );

      CREATE TABLE evidence (
        id INTEGER PRIMARY KEY,
        constraint_id TEXT NOT NULL REFERENCES constraints(id),
        revision INTEGER NOT NULL,
        test_id TEXT,
        result_id INTEGER,
        p_value REAL,
        effect_size REAL,
        sample_size INTEGER,
        note TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE supersessions (
        old_id TEXT PRIMARY KEY REFERENCES constraints(id),
        new_id TEXT NOT NULL REFERENCES constraints(id),
        version INTEGER NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX idx_revisions_status ON constraint_revisions(status);
      CREATE INDEX idx_evidence_constraint ON evidence(constraint_id);
      CREATE INDEX idx_supersessions_new ON supersessions(new_id);

      CREATE TRIGGER registry_head_no_delete BEFORE DELETE ON registry_head
      BEGIN SELECT RAISE(ABORT, 'registry head cannot be deleted'); END;
    `);
    for (const table of APPEND_ONLY) {
      db.exec(`
        CREATE TRIGGER ${table}_no_update BEFORE UPDATE ON ${table}
        BEGIN SELECT RAISE(ABORT, 'registry is append-only'); END;
        CREATE TRIGGER ${table}_no_delete BEFORE DELETE ON ${table}
        BEGIN SELECT RAISE(ABORT, 'registry is append-only'); END;
      `);
    }
  },

  // Migration 002: v1 → v2 — Pre-registrations, test results, permutation checkpoints
  (db) => {
    db.exec(`
      CREATE TABLE preregistrations (
        id INTEGER PRIMARY KEY,
        test_id TEXT NOT NULL,
        threshold TEXT NOT NULL,
        corpus_version TEXT NOT NULL,
        seed INTEGER,
        shuffles INTEGER,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE test_results (
        id INTEGER PRIMARY KEY,
        preregistration_id INTEGER NOT NULL UNIQUE REFERENCES preregistrations(id),
        test_id TEXT NOT NULL,
        verdict TEXT NOT NULL CHECK(verdict IN ('PASS', 'FAIL', 'INCONCLUSIVE')),
        statistic REAL,
        p_value REAL,
        effect_size REAL,
        sample_size INTEGER,
        reason TEXT,
        details TEXT,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE permutation_checkpoints (
        key TEXT PRIMARY KEY,
        test_id TEXT NOT NULL,
        target INTEGER NOT NULL,
        completed INTEGER NOT NULL,
        exceed INTEGER NOT NULL,
        observed REAL NOT NULL,
        rng_state INTEGER NOT NULL,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX idx_test_results_test ON test_results(test_id);
    `);
  },

  // Migration 003: v2 → v3 — Run reports
  (db) => {
    db.exec(`
      CREATE TABLE runs (
        id INTEGER PRIMARY KEY,
        command TEXT NOT NULL,
        corpus_version TEXT,
        successes INTEGER NOT NULL DEFAULT 0,
        exclusions INTEGER NOT NULL DEFAULT 0,
        inconclusive INTEGER NOT NULL DEFAULT 0,
        report TEXT NOT NULL,
        started_at DATETIME NOT NULL,
        finished_at DATETIME DEFAULT CURRENT_TIMESTAMP
      );
    `);
  },
];

export const SCHEMA_VERSION = migrations.length;

/**
 * Run all pending migrations. Uses user_version pragma for tracking.
 */
export function runMigrations(db: Database.Database): void {
  const raw = db.pragma('user_version', { simple: true });
  const currentVersion = typeof raw === 'number' ? raw : 0;

  for (let i = currentVersion; i < migrations.length; i++) {
    db.transaction(() => {
      migrations[i](db);
      db.pragma(`user_version = ${i + 1}`);
    })();
  }
}
