import { readFileSync } from 'node:fs';
import neo4j, { type Driver } from 'neo4j-driver';
import type { LoadConfig } from '../types/index.js';
import { SCHEMA_VERSION } from '../schema/tables.js';
import { ValidationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseCypherScript, planStatements, readSchemaVersion } from './cypher-script.js';

/**
 * Executes Cypher statements one at a time against a graph store.
 */
export interface CypherRunner {
    run(statement: string): Promise<void>;
    close(): Promise<void>;
}

/**
 * Runs statements through neo4j-driver, one auto-commit session per statement.
 */
export class Neo4jCypherRunner implements CypherRunner {
    private readonly driver: Driver;

    constructor(private readonly config: Pick<LoadConfig, 'uri' | 'user' | 'password' | 'database'>) {
        if (!config.password) {
            throw new ValidationError('Invalid load options', ['NEO4J_PASSWORD (or load.password) is required']);
        }
        this.driver = neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password));
    }

    async run(statement: string): Promise<void> {
        const session = this.driver.session({ database: this.config.database });
        try {
            await session.run(statement);
        } finally {
            await session.close();
        }
    }

    async close(): Promise<void> {
        await this.driver.close();
    }
}

export interface LoadOptions {
    /** Path of the Cypher script */
    script: string;
    /** Directory holding the CSV tables (the store's import directory) */
    importDir: string;
}

export interface LoadReport {
    statements: number;
    /** Tables with no batch files */
    skipped: string[];
}

/**
 * Run the bulk-load script, statement by statement, in file order.
 * A failing statement ends the load, and a script written for another table
 * schema version is refused before anything runs.
 */
export async function loadGraph(runner: CypherRunner, options: LoadOptions): Promise<LoadReport> {
    const logger = getLogger();
    const source = readFileSync(options.script, 'utf-8');
    const version = readSchemaVersion(source);
    if (version !== null && version !== SCHEMA_VERSION) {
        throw new ValidationError('Invalid load script', [
            `${options.script} targets schema version ${version}, tables are version ${SCHEMA_VERSION}`,
        ]);
    }
    const statements = parseCypherScript(source);
    const { planned, skipped } = planStatements(statements, options.importDir);

    if (skipped.length > 0) {
        logger.info({ tables: skipped }, 'No batch files; statements skipped');
    }

    for (const [index, statement] of planned.entries()) {
        logger.debug({ step: index + 1, of: planned.length, table: statement.prefix, batch: statement.batch }, 'Running statement');
        await runner.run(statement.text);
    }

    logger.info({ statements: planned.length }, 'Load complete');
    return { statements: planned.length, skipped };
}
