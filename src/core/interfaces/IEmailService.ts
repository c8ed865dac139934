export interface SendEmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

export interface IEmailSender {
  send(to: string, subject: string, body: string): Promise<SendEmailResult>;
}

export interface EmailValidation {
  valid: boolean;
  errorMessage?: string;
  suggestedCorrection?: string;
}

export interface IEmailValidator {
  validate(address: string): EmailValidation;
}
