/** Calendar date rendered as YYYY-MM-DD. */
export type DateString = `${number}-${number}-${number}`;
