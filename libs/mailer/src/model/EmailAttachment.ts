export interface EmailAttachment {
  filename: string;
  content: Buffer;
  contentType: string;
}
