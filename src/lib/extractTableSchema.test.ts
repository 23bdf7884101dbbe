import { describe, it, expect } from 'vitest'
import { extractTableSchema, findCreateTableBody, listTableNames, splitDefinitions } from './extractTableSchema'

const usersDump = `
DROP TABLE IF EXISTS \`users\`;
CREATE TABLE \`users\` (
  \`id\` bigint unsigned NOT NULL AUTO_INCREMENT,
  \`name\` varchar(255) NOT NULL,
  \`balance\` decimal(10,2) DEFAULT NULL,
  \`status\` enum('active','frozen') DEFAULT 'active',
  \`plan_id\` int DEFAULT NULL,
  PRIMARY KEY (\`id\`),
  UNIQUE KEY \`users_name_unique\` (\`name\`),
  KEY \`users_plan_id_foreign\` (\`plan_id\`),
  CONSTRAINT \`users_plan_id_foreign\` FOREIGN KEY (\`plan_id\`) REFERENCES \`plans\` (\`id\`)
) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4;
`

describe('extractTableSchema', () => {
  it('returns columns in declaration order and skips key lines', () => {
    expect(extractTableSchema(usersDump, 'users')).toEqual(['id', 'name', 'balance', 'status', 'plan_id'])
  })

  it('reads a single-line CREATE TABLE', () => {
    const dump = 'CREATE TABLE `plans` (`id` int, `name` varchar(50), `price` int) ENGINE=InnoDB;'
    expect(extractTableSchema(dump, 'plans')).toEqual(['id', 'name', 'price'])
  })

  it('preserves duplicate column names', () => {
    const dump = 'CREATE TABLE `dup` (`a` int, `b` int, `a` int) ENGINE=InnoDB;'
    expect(extractTableSchema(dump, 'dup')).toEqual(['a', 'b', 'a'])
  })

  it('returns an empty list for an unknown table', () => {
    expect(extractTableSchema(usersDump, 'coaches')).toEqual([])
  })

  it('does not match a table whose name only starts with the requested one', () => {
    const dump = 'CREATE TABLE `users_archive` (`id` int) ENGINE=InnoDB;'
    expect(extractTableSchema(dump, 'users')).toEqual([])
  })

  it('returns an empty list when the ENGINE terminator is missing', () => {
    expect(extractTableSchema('CREATE TABLE `t` (`id` int);', 't')).toEqual([])
  })

  it('keeps a bare FOREIGN KEY line as a column named FOREIGN', () => {
    const dump = 'CREATE TABLE `t` (`id` int, `plan_id` int, FOREIGN KEY (`plan_id`) REFERENCES `plans` (`id`)) ENGINE=InnoDB;'
    expect(extractTableSchema(dump, 't')).toEqual(['id', 'plan_id', 'FOREIGN'])
  })

  it('is case-sensitive about key prefixes', () => {
    const dump = 'CREATE TABLE `t` (`id` int, key_code varchar(5)) ENGINE=InnoDB;'
    expect(extractTableSchema(dump, 't')).toEqual(['id', 'key_code'])
  })
})

describe('findCreateTableBody', () => {
  it('returns the text between the opening parenthesis and ENGINE', () => {
    expect(findCreateTableBody('CREATE TABLE `t` (`id` int) ENGINE=MyISAM;', 't')).toBe('`id` int')
  })

  it('returns null for an absent table', () => {
    expect(findCreateTableBody('', 't')).toBeNull()
  })
})

describe('splitDefinitions', () => {
  it('splits on top-level commas only', () => {
    const body = "`a` int, `b` decimal(10,2), `c` varchar(5) DEFAULT 'x,y', `d` enum('p','q')"
    expect(splitDefinitions(body)).toEqual([
      '`a` int',
      '`b` decimal(10,2)',
      "`c` varchar(5) DEFAULT 'x,y'",
      "`d` enum('p','q')",
    ])
  })

  it('drops empty entries', () => {
    expect(splitDefinitions('\n  `a` int,\n\n')).toEqual(['`a` int'])
  })
})

describe('listTableNames', () => {
  it('lists every CREATE TABLE once in source order', () => {
    const dump = [
      'CREATE TABLE `b` (`id` int) ENGINE=InnoDB;',
      'CREATE TABLE `a` (`id` int) ENGINE=InnoDB;',
      'CREATE TABLE `b` (`id` int) ENGINE=InnoDB;',
    ].join('\n')
    expect(listTableNames(dump)).toEqual(['b', 'a'])
  })
})
