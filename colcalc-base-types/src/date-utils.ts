/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2024 trebco, llc. 
 * info@treb.app
 * 
 */

// all dates are UTC epoch milliseconds. there's no local time anywhere
// in here; a date is a calendar day at midnight UTC plus whatever time of
// day it carried in.

export const DAY_MS = 86400000;

export interface DateParts {
  year: number;

  /** 1-based */
  month: number;

  day: number;
}

/**
 * build a date from parts. we use setUTCFullYear rather than Date.UTC
 * because Date.UTC maps years 0-99 into the 1900s. returns undefined if
 * the parts don't describe a real day (Feb 30, month 13, etc).
 */
export const ConstructDate = (year: number, month: number, day: number): number|undefined => {

  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return undefined;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(0, 0, 0, 0);

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }

  return date.getTime();

};

export const GetDateParts = (value: number): DateParts => {
  const date = new Date(value);
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
};

/** month is 1-based */
export const DaysInMonth = (year: number, month: number): number => {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
};

/**
 * add calendar months. the day is clamped to the end of the target
 * month, so Jan 31 + 1 month is Feb 28 (or 29). time of day is kept.
 */
export const AddMonths = (value: number, months: number): number => {

  const parts = GetDateParts(value);
  const midnight = ConstructDate(parts.year, parts.month, parts.day) ?? value;
  const time = value - midnight;

  const total = parts.year * 12 + (parts.month - 1) + Math.trunc(months);
  const year = Math.floor(total / 12);
  const month = total - year * 12 + 1;
  const day = Math.min(parts.day, DaysInMonth(year, month));

  return (ConstructDate(year, month, day) ?? value) + time;

};

/**
 * parse a date. we accept YYYYMMDD, YYYY-MM-DD and M/D/YYYY, nothing
 * else. surrounding whitespace is ignored.
 */
export const ParseDate = (text: string): number|undefined => {

  const trimmed = text.trim();

  let match = trimmed.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (match) {
    return ConstructDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (match) {
    return ConstructDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = trimmed.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (match) {
    return ConstructDate(Number(match[3]), Number(match[1]), Number(match[2]));
  }

  return undefined;

};

/** numbers as YYYYMMDD, e.g. 20230228 */
export const DateFromNumber = (value: number): number|undefined => {
  if (!Number.isInteger(value) || value < 0) {
    return undefined;
  }
  const year = Math.floor(value / 10000);
  const month = Math.floor(value / 100) % 100;
  const day = value % 100;
  return ConstructDate(year, month, day);
};

/** M/D/YYYY */
export const FormatDate = (value: number): string => {
  const parts = GetDateParts(value);
  return `${parts.month}/${parts.day}/${parts.year}`;
};
