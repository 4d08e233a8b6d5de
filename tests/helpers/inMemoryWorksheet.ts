/**
* In-process stand-in for the slice of the Sheets v4 client the queue writer
* touches (`spreadsheets.values.append`). Rows land in a plain array so tests
* can assert the row count directly, and failures can be queued up front.
*/

export interface AppendParams {
  spreadsheetId?: string;
  range?: string;
  valueInputOption?: string;
  insertDataOption?: string;
  requestBody?: { values?: string[][] };
}

/** Error shaped like the ones gaxios raises for HTTP failures. */
export function sheetsApiError(status: number, message: string): Error {
  return Object.assign(new Error(message), { code: status, response: { status } });
}

export function createInMemoryWorksheet(name = 'Process') {
  const rows: string[][] = [];
  const failures: unknown[] = [];

  const append = jest.fn(async (params: AppendParams) => {
    if (failures.length) {
      throw failures.shift();
    }
    if (params.range !== `'${name}'!A1`) {
      throw sheetsApiError(400, `Unable to parse range: ${params.range}`);
    }

    const values = params.requestBody?.values ?? [];
    rows.push(...values);

    return { data: { updates: { updatedRange: `${name}!A${rows.length}`, updatedRows: values.length } } };
  });

  return {
    rows,
    append,
    client: { spreadsheets: { values: { append } } },
    /** Queue errors thrown by the next append calls, in order. */
    failWith(...errors: unknown[]): void {
      failures.push(...errors);
    },
    reset(): void {
      rows.length = 0;
      failures.length = 0;
      append.mockClear();
    },
  };
}
