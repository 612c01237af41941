export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const env = import.meta.env;

const config = {
  apiBaseUrl: env.VITE_NHTSA_API_URL || 'https://vpic.nhtsa.dot.gov/api/vehicles',
  // 0 leaves the transport default in place
  requestTimeoutMs: parseNumber(env.VITE_REQUEST_TIMEOUT_MS, 0),
  pdfViewerHeight: parseNumber(env.VITE_PDF_VIEWER_HEIGHT, 800),
  letterRecordType: 565,
  firstYear: 1950,
};

export const getYearRange = (now: Date = new Date()): number[] => {
  const years: number[] = [];
  for (let year = now.getFullYear(); year >= config.firstYear; year--) {
    years.push(year);
  }
  return years;
};

export default config;
