import dayjs from 'dayjs';

export const format = (date: Date, pattern: string): string => dayjs(date).format(pattern);

export const addHours = (date: Date, hours: number): Date => dayjs(date).add(hours, 'hour').toDate();

/** Local calendar date as YYYY-MM-DD */
export const isoDay = (date: Date): string => dayjs(date).format('YYYY-MM-DD');
