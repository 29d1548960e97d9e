import { BranchRecord, StatColumn, StatValue, SummaryColumn } from '../types';

/** Print plus electronic titles; unknown when either part is unknown. */
export function totalResources(record: BranchRecord): StatValue {
  const { printTitles, electronicTitles } = record.stats;
  if (printTitles === null || electronicTitles === null) return null;
  return printTitles + electronicTitles;
}

/** Unknown when resources or cardholders are unknown, or there are no cardholders. */
export function resourcesPerCardholder(record: BranchRecord): StatValue {
  const resources = totalResources(record);
  const { cardholders } = record.stats;
  if (resources === null || cardholders === null || cardholders === 0) return null;
  return resources / cardholders;
}

export function summaryValue(record: BranchRecord, column: SummaryColumn): StatValue {
  return column === 'totalResources' ? totalResources(record) : record.stats[column];
}


/** Builds a full stat record by evaluating `valueOf` for every stat column. */
export function mapStatColumns<T>(valueOf: (column: StatColumn) => T): Record<StatColumn, T> {
  return {
    cardholders: valueOf('cardholders'),
    circulation: valueOf('circulation'),
    printTitles: valueOf('printTitles'),
    englishPrintTitles: valueOf('englishPrintTitles'),
    frenchPrintTitles: valueOf('frenchPrintTitles'),
    otherPrintTitles: valueOf('otherPrintTitles'),
    electronicTitles: valueOf('electronicTitles'),
    englishElectronicTitles: valueOf('englishElectronicTitles'),
    frenchElectronicTitles: valueOf('frenchElectronicTitles'),
    otherElectronicTitles: valueOf('otherElectronicTitles'),
  };
}
