export interface EmailContentSuggestion {
  subject: string;
  greeting: string;
  body: string;
  call_to_action: string;
  closing: string;
}
