/** 밀리초 단위 현재 시각을 돌려주는 함수. 테스트에서 시간을 고정하기 위해 주입한다. */
export type Clock = () => number;

export const CLOCK = Symbol('LINK_MONITOR_CLOCK');

export const systemClock: Clock = () => Date.now();
