import { ShiftRecord } from "./types";

export class ShiftIntegrityError extends Error {
  readonly shiftId: string;
  readonly staffId: string;

  constructor(shift: Pick<ShiftRecord, "id" | "staffId">, detail: string) {
    super(`Shift ${shift.id} of staff ${shift.staffId} is malformed: ${detail}`);
    this.name = "ShiftIntegrityError";
    this.shiftId = shift.id;
    this.staffId = shift.staffId;
  }
}
