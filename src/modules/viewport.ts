/**
 * Viewport Module
 * Vertical scroll window over rendered lines
 */

export class Viewport {
  yOffset = 0;
  private lines: string[] = [];

  constructor(
    public width = 0,
    public height = 0,
  ) {}

  setContent(content: string): void {
    this.lines = content === "" ? [] : content.split("\n");
    if (this.pastBottom()) {
      this.gotoBottom();
    }
  }

  get totalLineCount(): number {
    return this.lines.length;
  }

  private maxYOffset(): number {
    return Math.max(0, this.lines.length - this.height);
  }

  atTop(): boolean {
    return this.yOffset <= 0;
  }

  atBottom(): boolean {
    return this.yOffset >= this.maxYOffset();
  }

  pastBottom(): boolean {
    return this.yOffset > this.maxYOffset();
  }

  /**
   * Fraction scrolled, 1 when everything fits
   */
  scrollPercent(): number {
    if (this.height >= this.lines.length) {
      return 1;
    }
    const percent = this.yOffset / (this.lines.length - this.height);
    return Math.max(0, Math.min(1, percent));
  }

  setYOffset(offset: number): void {
    this.yOffset = Math.max(0, Math.min(offset, this.maxYOffset()));
  }

  gotoTop(): void {
    this.yOffset = 0;
  }

  gotoBottom(): void {
    this.yOffset = this.maxYOffset();
  }

  lineDown(n = 1): void {
    this.setYOffset(this.yOffset + n);
  }

  lineUp(n = 1): void {
    this.setYOffset(this.yOffset - n);
  }

  pageDown(): void {
    this.lineDown(Math.max(1, this.height));
  }

  pageUp(): void {
    this.lineUp(Math.max(1, this.height));
  }

  halfPageDown(): void {
    this.lineDown(Math.max(1, Math.floor(this.height / 2)));
  }

  halfPageUp(): void {
    this.lineUp(Math.max(1, Math.floor(this.height / 2)));
  }

  /**
   * Visible lines, padded with blanks to the viewport height
   */
  visibleLines(): string[] {
    const visible = this.lines.slice(this.yOffset, this.yOffset + this.height);
    while (visible.length < this.height) {
      visible.push("");
    }
    return visible;
  }
}
