export type SessionMode = "IDLE" | "WAITING_WALLET" | "WAITING_CONTRACT";

export type UserSession = {
  mode: SessionMode;
};
