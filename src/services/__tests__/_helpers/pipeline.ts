import type { ExternalSeriesRows, RawRow } from '../../../types/sources';
import { eventRow } from './fixtures';

const MARKET = 'Deutschland/Luxemburg [€/MWh]';
const CARBON = 'Carbon intensity gCO₂eq/kWh (direct)';

export const pipelineEventRows: RawRow[] = [
  eventRow('01.01.2024 10:00', '01.01.2024 10:30', 50, { stated: 45 }),
  eventRow('01.01.2024 10:45', '01.01.2024 11:15', 100, { stated: 30 }),
  eventRow('02.01.2024 08:00', '02.01.2024 09:00', 0, { stated: 60 }),
  eventRow('03.01.2024 12:00', '03.01.2024 13:00', 100, { plant: 'PLANT-2', stated: 60 }),
  eventRow('garbage', '01.01.2024 12:00', 50)
];

export const pipelineSeriesRows: ExternalSeriesRows = {
  marketPrice: [
    { 'Datum von': '01.01.2024 10:00', [MARKET]: '100,00' },
    { 'Datum von': '01.01.2024 11:00', [MARKET]: 80 }
  ],
  redispatchPrice: [{ 'Datum von': '01.01.2024 10:00', 'Preis [€/MWh]': '20' }],
  carbonIntensity: [
    { 'Datetime (UTC)': '2024-01-01 09:00:00', [CARBON]: 400 },
    { 'Datetime (UTC)': '2024-01-01 10:00:00', [CARBON]: 300 }
  ]
};
