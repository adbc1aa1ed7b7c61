import type { DecisionTable, RuleSpec } from '../types.js';
import { loadDecisionTable } from './table.js';

/**
 * Built-in payout grid. Order matters: the first matching row wins, so
 * bracket-specific rows sit above their catch-all siblings.
 */
export const DEFAULT_RULE_SPECS: readonly RuleSpec[] = [
  { lob: 'TW', segment: '1+5', formula: '90% of Payin' },
  { lob: 'TW', segment: 'TW SAOD + COMP', formula: '90% of Payin' },

  { lob: 'TW', segment: 'TW TP', insurers: ['Bajaj', 'Digit', 'ICICI'], formula: '-2%', remarks: 'Payin Below 20%' },
  { lob: 'TW', segment: 'TW TP', insurers: ['Bajaj', 'Digit', 'ICICI'], formula: '-3%' },
  { lob: 'TW', segment: 'TW TP', insurers: 'Rest of Companies', formula: '-2%', remarks: 'Payin Below 20%' },
  { lob: 'TW', segment: 'TW TP', insurers: 'Rest of Companies', formula: '-3%', remarks: 'Payin 21% to 30%' },
  { lob: 'TW', segment: 'TW TP', insurers: 'Rest of Companies', formula: '-4%', remarks: 'Payin 31% to 50%' },
  { lob: 'TW', segment: 'TW TP', insurers: 'Rest of Companies', formula: '-5%', remarks: 'Payin Above 50%' },

  { lob: 'PVT CAR', segment: 'PVT CAR COMP + SAOD', formula: '90% of Payin', remarks: 'All Fuel' },
  { lob: 'PVT CAR', segment: 'PVT CAR TP', insurers: ['Bajaj', 'Digit', 'SBI'], formula: '-2%', remarks: 'Payin Below 20%' },
  { lob: 'PVT CAR', segment: 'PVT CAR TP', insurers: ['Bajaj', 'Digit', 'SBI'], formula: '-3%' },
  { lob: 'PVT CAR', segment: 'PVT CAR TP', insurers: 'Rest of Companies', formula: '90% of Payin' },

  { lob: 'CV', segment: 'Upto 2.5 GVW', insurers: ['Reliance', 'SBI'], formula: '-2%' },
  { lob: 'CV', segment: 'Upto 2.5 GVW', insurers: 'Rest of Companies', formula: '-3%' },
  { lob: 'CV', segment: 'All GVW & PCV 3W, GCV 3W', formula: '-2%', remarks: 'Payin Below 20%' },
  { lob: 'CV', segment: 'All GVW & PCV 3W, GCV 3W', formula: '-3%', remarks: 'Payin 21% to 30%' },
  { lob: 'CV', segment: 'All GVW & PCV 3W, GCV 3W', formula: '-4%', remarks: 'Payin 31% to 50%' },
  { lob: 'CV', segment: 'All GVW & PCV 3W, GCV 3W', formula: '-5%', remarks: 'Payin Above 50%' },

  { lob: 'BUS', segment: 'SCHOOL BUS', formula: 'Less 2% of Payin' },
  { lob: 'BUS', segment: 'STAFF BUS', formula: '88% of Payin' },

  { lob: 'TAXI', segment: 'TAXI', formula: '-2%', remarks: 'Payin Below 20%' },
  { lob: 'TAXI', segment: 'TAXI', formula: '-3%', remarks: 'Payin 21% to 30%' },
  { lob: 'TAXI', segment: 'TAXI', formula: '-4%', remarks: 'Payin 31% to 50%' },
  { lob: 'TAXI', segment: 'TAXI', formula: '-5%', remarks: 'Payin Above 50%' },

  { lob: 'MISD', segment: 'Misd, Tractor', insurers: ['Reliance'], formula: '88% of Payin' },
];

export const DEFAULT_DECISION_TABLE: DecisionTable = loadDecisionTable(DEFAULT_RULE_SPECS);
