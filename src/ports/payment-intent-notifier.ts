export interface AuthorizationNotice {
  orgId: string;
  paymentIntentId: string;
  providerReference: string;
  authCode: string | null;
}

export interface CaptureNotice {
  orgId: string;
  paymentIntentId: string;
  providerReference: string;
  capturedAmount: number;
}

export interface PaymentIntentNotifierPort {
  recordAuthorization(notice: AuthorizationNotice): Promise<void>;
  recordCapture(notice: CaptureNotice): Promise<void>;
}
