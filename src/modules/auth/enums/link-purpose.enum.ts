/** Each purpose signs with its own derived key, so links never cross flows. */
export enum LinkPurpose {
  EMAIL_VERIFICATION = 'email-verification',
  PASSWORD_RESET = 'password-reset',
}
