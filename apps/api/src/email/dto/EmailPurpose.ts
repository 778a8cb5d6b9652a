export enum EmailPurpose {
  INTRODUCTION = 'introduction',
  FOLLOW_UP = 'follow-up',
  PARTNERSHIP = 'partnership',
}

export enum EmailTone {
  PROFESSIONAL = 'professional',
  CASUAL = 'casual',
  FRIENDLY = 'friendly',
}
