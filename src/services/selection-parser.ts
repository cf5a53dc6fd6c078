import { REQUIRED_SELECTION_COLUMNS, selectionRowSchema } from '../schemas/unsubscribe';
import { InvalidSelectionInputError } from '../types/errors';
import { UnsubscribeSelection } from '../types/unsubscribe';
import { parseCsv } from '../utils/csv';

/**
 * Reads the user-edited selection file. Rows are numbered as a spreadsheet
 * shows them: the header is row 1.
 */
export function parseSelection(csvText: string): UnsubscribeSelection[] {
  let records: string[][];
  try {
    records = parseCsv(csvText);
  } catch (error) {
    throw new InvalidSelectionInputError(0, error instanceof Error ? error.message : String(error));
  }

  const [header, ...rows] = records;
  if (!header) {
    throw new InvalidSelectionInputError(1, 'missing header row');
  }

  const columns = header.map(name => name.trim());
  for (const required of REQUIRED_SELECTION_COLUMNS) {
    if (!columns.includes(required)) {
      throw new InvalidSelectionInputError(1, `missing column "${required}"`);
    }
  }

  const selections: UnsubscribeSelection[] = [];
  rows.forEach((fields, index) => {
    const rowNumber = index + 2;
    if (fields.every(field => field.trim() === '')) return;

    if (fields.length !== columns.length) {
      throw new InvalidSelectionInputError(
        rowNumber,
        `expected ${columns.length} fields, found ${fields.length}`
      );
    }

    const input: Record<string, string> = {};
    columns.forEach((column, position) => {
      input[column] = fields[position];
    });

    const parsed = selectionRowSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.errors[0];
      throw new InvalidSelectionInputError(rowNumber, issue ? issue.message : 'invalid row');
    }

    selections.push({
      row: rowNumber,
      domain: parsed.data['Domain'],
      token: parsed.data['Token'],
      unsubscribeUrl: parsed.data['Unsubscribe URL'],
      delete: parsed.data['Delete'],
      unsubscribeAvailable: parsed.data['List-Unsubscribe']
    });
  });

  return selections;
}
