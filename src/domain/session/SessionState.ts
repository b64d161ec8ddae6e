export type SessionStateValue = "IDLE" | "ARMED";

export class SessionState {
  private current: SessionStateValue = "IDLE";

  get value(): SessionStateValue {
    return this.current;
  }

  toIdle() {
    this.current = "IDLE";
  }

  toArmed() {
    this.current = "ARMED";
  }
}
