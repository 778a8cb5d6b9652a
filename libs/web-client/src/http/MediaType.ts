export enum MediaType {
  TEXT_HTML = 'text/html',
}
