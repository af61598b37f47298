export const P = {
  topK: 3,
  underdogFactor: 0.5,
  historyLimit: 10,
  // Months (1-based) in which a start date already in the past is read as next season.
  rolloverMonthMax: 3,
  defaultDivision: 'MPO',
  defaultLocation: 'USA',
} as const;
