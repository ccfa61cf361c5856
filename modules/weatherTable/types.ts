export type ColumnKind = "numeric" | "date" | "other";

export type ColumnSpec = {
  name: string;
  kind: ColumnKind;
};

export type CellValue = number | string | null;

export type WeatherRecord = {
  date: string; // YYYY-MM-DD
  values: Readonly<Record<string, CellValue>>;
};

export type WeatherTable = {
  readonly columns: ReadonlyArray<Readonly<ColumnSpec>>;
  readonly rows: ReadonlyArray<Readonly<WeatherRecord>>;
};

export const DATE_COLUMN = "date";

// Column names of the upload/fetch contract.
export const TEMPERATURE = "temperature";
export const PRECIPITATION = "precipitation";
export const WIND_SPEED = "wind_speed";
export const PRESSURE = "pressure";

export const CONTRACT_COLUMNS = [DATE_COLUMN, TEMPERATURE, PRECIPITATION, WIND_SPEED, PRESSURE] as const;
