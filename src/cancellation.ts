/**
 * Cooperative stop flag. The collector polls it between groups, so the group
 * in flight always runs to completion.
 */
export class CancellationToken {
  private flag = false;

  get cancelled(): boolean {
    return this.flag;
  }

  cancel(): void {
    this.flag = true;
  }
}
