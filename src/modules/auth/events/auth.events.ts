export const AuthEvents = {
  USER_REGISTERED: 'user.registered',
  VERIFICATION_REQUESTED: 'user.verification_requested',
  PASSWORD_RESET_REQUESTED: 'user.password_reset_requested',
} as const;

export interface AccountMailEvent {
  uid: string;
  username: string;
  email: string;
}

export interface PasswordResetMailEvent extends AccountMailEvent {
  passwordStamp: string;
}
