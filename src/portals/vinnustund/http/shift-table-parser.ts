/**
 * Shift Table Parser
 *
 * Reads the portal's timesheet grid (`table.clsTableControl`) into
 * ShiftRecords. Columns are read by position; the portal's header labels are
 * not reliable, so they are never consulted.
 */

import * as cheerio from 'cheerio';
import { createLogger, type Logger } from '../../../shared/utils/logger.js';
import { SHIFT_TABLE_CLASS, type PayElements, type ShiftRecord } from '../types/index.js';

// ============================================================================
// Column layout
// ============================================================================

const COLUMN = {
  DAY_OF_WEEK: 0,
  DATE: 1,
  WORK_HOURS: 2,
  WORK_HOURS_EXTRA: 3,
  NOTE: 4,
  CLOCK_IN: 5,
  TIME_ENTERED: 6,
  CALCULATION_METHOD: 7,
  TOTAL_HOURS: 8,
  ABSENCE_SUPPLEMENT: 9,
  HOURS_UNITS: 10,
  REMARK: 11,
  STATUS_SHIFT: 12,
  STATUS_TIME: 13,
  PAY_ELEMENTS_START: 14
} as const;

const PAY_ELEMENT_COUNT = 5;
const MIN_DATA_CELLS = 3;

interface ParsedCell {
  text: string;
  title: string;
}

const EMPTY_CELL: ParsedCell = { text: '', title: '' };

export interface ShiftTableParserOptions {
  logger?: Logger;
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Collapse all whitespace (including non-breaking spaces) and trim
 */
export function normalizeCellText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parse every shift row of the timesheet table. A page without the table
 * yields an empty list, the same as a table with no rows.
 */
export function parseShiftTable(html: string, options: ShiftTableParserOptions = {}): ShiftRecord[] {
  const logger = options.logger ?? createLogger('ShiftTableParser');
  const $ = cheerio.load(html);

  const tables = $(`table.${SHIFT_TABLE_CLASS}`).toArray();
  if (tables.length === 0) {
    logger.warn(`No table.${SHIFT_TABLE_CLASS} found on page (${html.length} chars), returning no shifts`);
    return [];
  }

  // Several grids can share the class; the timesheet is the largest
  const table = tables.reduce((best, candidate) =>
    $(candidate).find('tr').length > $(best).find('tr').length ? candidate : best
  );

  const records: ShiftRecord[] = [];

  $(table).find('tr').each((_, row) => {
    const $row = $(row);
    const tdCells = $row.children('td');

    if (tdCells.length === 0 || $row.children('td.vrTableHeader').length > 0) {
      return;
    }
    if (tdCells.length < MIN_DATA_CELLS) {
      return;
    }
    const cells: ParsedCell[] = tdCells.toArray().map((cell, index) => {
      const $cell = $(cell);
      let title = '';
      if (index === COLUMN.TIME_ENTERED) {
        title = $cell.find('a[title]').first().attr('title') ?? '';
      } else if (index === COLUMN.STATUS_SHIFT || index === COLUMN.STATUS_TIME) {
        title = $cell.find('span[title]').first().attr('title') ?? '';
      }
      return { text: normalizeCellText($cell.text()), title: normalizeCellText(title) };
    });

    // Summary rows carry their label in the day column
    const day = cellAt(cells, COLUMN.DAY_OF_WEEK).text;
    if (day === '' || day.toLowerCase().includes('total')) {
      return;
    }

    records.push(buildShiftRecord(cells));
  });

  logger.debug(`Parsed ${records.length} shift rows`);
  return records;
}

function cellAt(cells: ParsedCell[], index: number): ParsedCell {
  return cells[index] ?? EMPTY_CELL;
}

function buildShiftRecord(cells: ParsedCell[]): ShiftRecord {
  const text = (index: number): string => cellAt(cells, index).text;
  const title = (index: number): string => cellAt(cells, index).title;
  const pay = (offset: number): string => text(COLUMN.PAY_ELEMENTS_START + offset);

  const payElements: PayElements = Object.freeze({
    payElement1: pay(0),
    payElement2: pay(1),
    payElement3: pay(2),
    payElement4: pay(3),
    payElement5: pay(PAY_ELEMENT_COUNT - 1)
  });

  return Object.freeze({
    dayOfWeek: text(COLUMN.DAY_OF_WEEK),
    date: text(COLUMN.DATE),
    workHours: text(COLUMN.WORK_HOURS),
    workHoursExtra: text(COLUMN.WORK_HOURS_EXTRA),
    note: text(COLUMN.NOTE),
    clockIn: text(COLUMN.CLOCK_IN),
    timeEntered: text(COLUMN.TIME_ENTERED),
    timeEnteredTitle: title(COLUMN.TIME_ENTERED),
    calculationMethod: text(COLUMN.CALCULATION_METHOD),
    totalHours: text(COLUMN.TOTAL_HOURS),
    absenceSupplement: text(COLUMN.ABSENCE_SUPPLEMENT),
    hoursUnits: text(COLUMN.HOURS_UNITS),
    remark: text(COLUMN.REMARK),
    statusShift: text(COLUMN.STATUS_SHIFT),
    statusShiftTitle: title(COLUMN.STATUS_SHIFT),
    statusTime: text(COLUMN.STATUS_TIME),
    statusTimeTitle: title(COLUMN.STATUS_TIME),
    payElements,
    rawText: cells.map(cell => cell.text).filter(cellText => cellText !== '').join(' | ')
  });
}
