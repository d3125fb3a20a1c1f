/**
 * Clock Port - wall-clock seconds
 */

export interface ClockPort {
  nowSec(): number;
}
