export enum ExportFormat {
  JSON = 'json',
  CSV = 'csv',
}
