/** Calendar date in `YYYY-MM-DD` form. */
export type DateString = `${number}-${number}-${number}`;
