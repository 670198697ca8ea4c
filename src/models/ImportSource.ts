export interface ImportSource {
  id: string;
  sourceName: string;
  filename: string | null;
  totalRecords: number;
  importedRecords: number;
  duplicateRecords: number;
  brokenRecords: number;
  dncBlockedRecords: number;
  importedAt: Date;
}

export type NewImportSource = Omit<ImportSource, 'id' | 'importedAt'>;
