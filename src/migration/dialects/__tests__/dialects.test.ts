/**
 * Unit tests for the migration dialects
 */

import { describe, it, expect } from 'vitest';
import {
    MySqlDialect,
    PostgresDialect,
    createDialect,
    deriveTables,
    namespaceOf
} from '../index.js';
import { InvalidIdentifierError } from '../../../types/errors.js';
import { createTestConfig } from '../../../__tests__/mocks/config.js';

const mysqlTables = deriveTables('orders', 'id', 'mysql');
const pgTables = deriveTables('orders', 'id', 'postgres');

describe('deriveTables', () => {
    it('should derive every name from the table', () => {
        expect(mysqlTables).toEqual({
            source: 'orders',
            shadow: '_orders_new',
            audit: '_orders_audit',
            old: 'orders_old',
            key: 'id',
            triggers: {
                insert: 'orders_insert',
                update: 'orders_update',
                delete: 'orders_delete'
            },
            triggerFunction: '_orders_audit_fn'
        });
    });

    it('should reject a table whose derived names are too long', () => {
        // only the trigger function name passes 63 characters
        const table = 'a'.repeat(54);
        expect(() => deriveTables(table, 'id', 'mysql')).not.toThrow();
        expect(() => deriveTables(table, 'id', 'postgres')).toThrow(InvalidIdentifierError);
    });

    it('should reject an invalid key column', () => {
        expect(() => deriveTables('orders', 'order id', 'mysql')).toThrow(InvalidIdentifierError);
    });
});

describe('namespaceOf and createDialect', () => {
    it('should use the database for MySQL', () => {
        const config = createTestConfig();
        expect(namespaceOf(config)).toBe('shop');
        expect(createDialect(config)).toBeInstanceOf(MySqlDialect);
    });

    it('should use the schema for PostgreSQL, defaulting to public', () => {
        expect(namespaceOf(createTestConfig({ dialect: 'postgres' }))).toBe('public');
        expect(namespaceOf(createTestConfig({ dialect: 'postgres', schema: 'sales' }))).toBe('sales');
        expect(createDialect(createTestConfig({ dialect: 'postgres' }))).toBeInstanceOf(PostgresDialect);
    });
});

describe('MySqlDialect', () => {
    const dialect = new MySqlDialect('shop');

    it('should list columns with positional markers', () => {
        expect(dialect.listColumns('orders')).toEqual({
            sql: 'SELECT column_name AS column_name FROM information_schema.columns ' +
                'WHERE table_schema = ? AND table_name = ? ORDER BY ordinal_position',
            params: ['shop', 'orders'],
            idempotent: true
        });
    });

    it('should create triggers that capture the key and row', () => {
        const [insert, update, remove] = dialect.createTriggers(mysqlTables, ['id', 'total']);

        expect(insert?.sql).toBe(
            'CREATE TRIGGER `orders_insert` AFTER INSERT ON `orders` FOR EACH ROW ' +
            'INSERT INTO `_orders_audit` (action, original_id, row_data) ' +
            "VALUES ('INSERT', NEW.`id`, JSON_OBJECT('id', NEW.`id`, 'total', NEW.`total`))"
        );
        expect(update?.sql).toContain("VALUES ('UPDATE', NEW.`id`,");
        expect(remove?.sql).toBe(
            'CREATE TRIGGER `orders_delete` AFTER DELETE ON `orders` FOR EACH ROW ' +
            'INSERT INTO `_orders_audit` (action, original_id, row_data) ' +
            "VALUES ('DELETE', OLD.`id`, JSON_OBJECT('old', JSON_OBJECT('id', OLD.`id`, 'total', OLD.`total`)))"
        );
        expect(insert?.idempotent).toBe(false);
    });

    it('should create the shadow table like the source', () => {
        expect(dialect.createShadowTable(mysqlTables).sql).toBe('CREATE TABLE `_orders_new` LIKE `orders`');
    });

    it('should alter the shadow table', () => {
        expect(dialect.alterShadowTable(mysqlTables, 'ADD COLUMN note TEXT')).toEqual({
            sql: 'ALTER TABLE `_orders_new` ADD COLUMN note TEXT',
            params: [],
            idempotent: false
        });
    });

    it('should clear and copy a key range', () => {
        expect(dialect.clearRange(mysqlTables, 1, 1000)).toEqual({
            sql: 'DELETE FROM `_orders_new` WHERE `id` BETWEEN ? AND ?',
            params: [1, 1000],
            idempotent: true
        });
        expect(dialect.copyRange(mysqlTables, ['id', 'total'], 1, 1000)).toEqual({
            sql: 'INSERT INTO `_orders_new` (`id`, `total`) SELECT `id`, `total` ' +
                'FROM `orders` WHERE `id` BETWEEN ? AND ?',
            params: [1, 1000],
            idempotent: false
        });
    });

    it('should read the audit log in id order', () => {
        expect(dialect.readAudit(mysqlTables, 40, 500)).toEqual({
            sql: 'SELECT id, action, original_id FROM `_orders_audit` WHERE id > ? ORDER BY id LIMIT 500',
            params: [40],
            idempotent: true
        });
    });

    it('should swap both tables in one RENAME', () => {
        expect(dialect.swapTables(mysqlTables).sql).toBe(
            'RENAME TABLE `orders` TO `orders_old`, `_orders_new` TO `orders`'
        );
    });

    it('should drop triggers by name', () => {
        expect(dialect.dropTriggers(mysqlTables, true).map((s) => s.sql)).toEqual([
            'DROP TRIGGER IF EXISTS `orders_insert`',
            'DROP TRIGGER IF EXISTS `orders_update`',
            'DROP TRIGGER IF EXISTS `orders_delete`'
        ]);
    });

    it('should drop tables only if they exist', () => {
        expect(dialect.dropTable('orders_old')).toEqual({
            sql: 'DROP TABLE IF EXISTS `orders_old`',
            params: [],
            idempotent: true
        });
    });
});

describe('PostgresDialect', () => {
    const dialect = new PostgresDialect('sales');

    it('should number its bind markers', () => {
        expect(dialect.listColumns('orders').sql).toContain('table_schema = $1 AND table_name = $2');
        expect(dialect.deleteShadowRow(pgTables, 9)).toEqual({
            sql: 'DELETE FROM "_orders_new" WHERE "id" = $1',
            params: [9],
            idempotent: true
        });
        expect(dialect.copyRow(pgTables, ['id'], 9).sql).toBe(
            'INSERT INTO "_orders_new" ("id") SELECT "id" FROM "orders" WHERE "id" = $1'
        );
        expect(dialect.deleteAuditEntry(pgTables, 3).sql).toBe('DELETE FROM "_orders_audit" WHERE id = $1');
    });

    it('should use one schema-qualified trigger function', () => {
        const statements = dialect.createTriggers(pgTables);

        expect(statements).toHaveLength(4);
        expect(statements[0]?.sql).toContain('CREATE OR REPLACE FUNCTION "sales"."_orders_audit_fn"() RETURNS trigger');
        expect(statements[0]?.sql).toContain('INSERT INTO "sales"."_orders_audit" (action, original_id, row_data)');
        expect(statements[0]?.idempotent).toBe(true);
        expect(statements[1]?.sql).toBe(
            'CREATE TRIGGER "orders_insert" AFTER INSERT ON "orders" ' +
            'FOR EACH ROW EXECUTE FUNCTION "sales"."_orders_audit_fn"()'
        );
        expect(statements[3]?.sql).toContain('AFTER DELETE ON "orders"');
    });

    it('should copy the source structure into the shadow table', () => {
        expect(dialect.createShadowTable(pgTables).sql).toBe(
            'CREATE TABLE "_orders_new" (LIKE "orders" INCLUDING ALL)'
        );
    });

    it('should swap both tables in one block', () => {
        expect(dialect.swapTables(pgTables).sql).toBe(
            'DO $$ BEGIN ALTER TABLE "orders" RENAME TO "orders_old"; ' +
            'ALTER TABLE "_orders_new" RENAME TO "orders"; END $$'
        );
    });

    it('should drop triggers from the table that carries them', () => {
        expect(dialect.dropTriggers(pgTables, false).map((s) => s.sql)).toEqual([
            'DROP TRIGGER IF EXISTS "orders_insert" ON "orders"',
            'DROP TRIGGER IF EXISTS "orders_update" ON "orders"',
            'DROP TRIGGER IF EXISTS "orders_delete" ON "orders"',
            'DROP FUNCTION IF EXISTS "sales"."_orders_audit_fn"()'
        ]);
        expect(dialect.dropTriggers(pgTables, true)[0]?.sql).toBe(
            'DROP TRIGGER IF EXISTS "orders_insert" ON "orders_old"'
        );
    });

    it('should use BIGSERIAL and JSONB for the audit table', () => {
        const { sql } = dialect.createAuditTable(pgTables);

        expect(sql).toContain('CREATE TABLE IF NOT EXISTS "_orders_audit"');
        expect(sql).toContain('id BIGSERIAL PRIMARY KEY');
        expect(sql).toContain('row_data JSONB');
    });
});
