import { LOGIN_COLUMNS, type LoginColumn } from "@roster-outreach/shared";
import { appendColumns, cell, findColumn, type CsvTable } from "./csv";
import { COL_EMAIL } from "./types";

export type LoginRecord = Record<LoginColumn, string>;

export type LoginHistory = ReadonlyMap<string, LoginRecord>;

// Report exports end with a "Total" row; it is not a user.
export function loadLoginHistory(table: CsvTable): LoginHistory {
  const username = findColumn(table.fields, "Username");
  if (!username) throw new Error("Login data has no 'Username' column.");
  const views = findColumn(table.fields, "Count of Views");
  const lastLogin = findColumn(table.fields, "Last Login");

  const history = new Map<string, LoginRecord>();
  for (const row of table.rows) {
    const key = cell(row, username).toLowerCase();
    if (!key || key === "total") continue;
    history.set(key, {
      count_of_views: views ? cell(row, views) : "",
      last_login: lastLogin ? cell(row, lastLogin) : "",
    });
  }
  return history;
}

export function appendLoginData(table: CsvTable, history: LoginHistory): { table: CsvTable; matched: number } {
  let matched = 0;
  const rows = table.rows.map((row) => {
    const record = history.get(cell(row, COL_EMAIL).toLowerCase());
    if (record) matched += 1;
    return {
      ...row,
      count_of_views: record?.count_of_views ?? "",
      last_login: record?.last_login ?? "",
    };
  });
  return { table: { fields: appendColumns(table.fields, LOGIN_COLUMNS), rows }, matched };
}
