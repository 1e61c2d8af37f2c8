export type ClockPort = () => Date;
