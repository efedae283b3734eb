import { Pool } from 'pg'
import { readdir, readFile } from 'fs/promises'
import { join } from 'path'
import { config } from '../config/env'

const MIGRATION_FILE = /^\d+_.+\.sql$/

const pool = new Pool(config.db)

async function runMigrations() {
  const client = await pool.connect()

  try {
    console.log('🔄 Checking migrations...')

    await client.query(`
      CREATE TABLE IF NOT EXISTS drizzle_migrations (
        id SERIAL PRIMARY KEY,
        hash text NOT NULL,
        created_at bigint
      )
    `)

    // Same relative path from src/scripts and dist/scripts
    const drizzleDir = join(__dirname, '../../drizzle')
    const files = await readdir(drizzleDir)
    const migrationFiles = files.filter(f => MIGRATION_FILE.test(f)).sort()

    console.log(`📦 ${migrationFiles.length} migration(s) found`)

    for (const file of migrationFiles) {
      const applied = await client.query('SELECT id FROM drizzle_migrations WHERE hash = $1', [file])
      if (applied.rows.length > 0) {
        console.log(`⏭️  ${file} already applied`)
        continue
      }

      console.log(`▶️  Applying ${file}...`)
      const sql = await readFile(join(drizzleDir, file), 'utf-8')

      await client.query('BEGIN')
      try {
        await client.query(sql)
        await client.query('INSERT INTO drizzle_migrations (hash, created_at) VALUES ($1, $2)', [file, Date.now()])
        await client.query('COMMIT')
        console.log(`✅ ${file} applied`)
      } catch (err) {
        await client.query('ROLLBACK')
        throw err
      }
    }

    console.log('✅ Database is up to date')
  } catch (err) {
    console.error('❌ Migration failed:', err)
    process.exitCode = 1
  } finally {
    client.release()
    await pool.end()
  }
}

void runMigrations()
