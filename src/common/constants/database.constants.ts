/** Largest value of a PostgreSQL `INTEGER` / `SERIAL` column. */
export const MAX_SERIAL_ID = 2_147_483_647;
