const BANNED = /\b(INSERT|UPDATE|DELETE|MERGE|ALTER|DROP|CREATE|TRUNCATE|COPY|GRANT|REVOKE|VACUUM|ANALYZE|CALL|DO|LOCK|SET|RESET)\b/i;

/** Strips Markdown fences, a leading "SQLQuery:" label and one trailing semicolon. */
export function cleanSql(raw: string): string {
  let s = raw.trim();
  const fenced = s.match(/^```[a-z]*\s*([\s\S]*?)\s*```$/i);
  if (fenced) s = fenced[1].trim();
  s = s.replace(/^sqlquery:\s*/i, "");
  return s.replace(/;\s*$/, "").trim();
}

export function isSafeSelect(sql: string): boolean {
  const s = sql.trim();
  if (!/^(SELECT|WITH)\b/i.test(s)) return false;
  if (s.includes(";")) return false;
  if (BANNED.test(stripLiterals(s))) return false;
  if (/\b(pg_catalog|information_schema)\./i.test(s)) return false;
  return true;
}

// Keywords inside string literals ('... update ...') must not trip the guard
function stripLiterals(sql: string): string {
  return sql.replace(/'(?:[^']|'')*'/g, "''");
}

function unquote(ident: string): string {
  return ident.startsWith('"') ? ident.slice(1, -1).replace(/""/g, '"') : ident.toLowerCase();
}

const IDENT = `(?:"(?:[^"]|"")+"|[A-Za-z_][A-Za-z0-9_$]*)`;

// FROM inside EXTRACT(year FROM col) and friends names a column, not a relation
const FROM_FUNCTIONS = /\b(?:EXTRACT|SUBSTRING|TRIM|OVERLAY|POSITION)\s*\((?:[^()]|\([^()]*\))*\)/gi;

/** Relations named after FROM/JOIN, schema prefix dropped. Function calls in that position are skipped. */
export function referencedRelations(sql: string): string[] {
  const s = stripLiterals(sql).replace(FROM_FUNCTIONS, "0");
  const re = new RegExp(`(?<!DISTINCT\\s+)\\b(?:FROM|JOIN)\\s+(${IDENT}(?:\\s*\\.\\s*${IDENT})?)(?![\\w$"]|\\s*[(.])`, "gi");
  const names = new Set<string>();
  for (const m of s.matchAll(re)) {
    const parts = m[1].split(/\s*\.\s*/);
    names.add(unquote(parts[parts.length - 1]));
  }
  return [...names];
}

export function cteNames(sql: string): string[] {
  const s = stripLiterals(sql);
  const re = new RegExp(`(?:\\bWITH(?:\\s+RECURSIVE)?|,)\\s*(${IDENT})\\s*(?:\\([^)]*\\)\\s*)?AS\\s*\\(`, "gi");
  return [...s.matchAll(re)].map((m) => unquote(m[1]));
}

/** Referenced relations outside the allow-list; CTE names count as allowed. */
export function disallowedRelations(sql: string, allowed: readonly string[]): string[] {
  const ok = new Set([...allowed.map((t) => t.toLowerCase()), ...cteNames(sql)]);
  return referencedRelations(sql).filter((r) => !ok.has(r.toLowerCase()));
}

export function ensureLimit(sql: string, max = 1000): string {
  const s = sql.trim();
  if (/\blimit\b/i.test(s)) return s; // respect existing limit
  // Avoid appending inside parentheses; just add at end
  return `${s} LIMIT ${max}`;
}
