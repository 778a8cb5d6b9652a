export interface MailReceipt {
  messageId: string;
  from: string;
  to: string;
  cc: string[];
  attachmentsCount: number;
  sentAt: Date;
}
