import type { ThemeConfig } from 'antd';

// Count colors, from "nothing yet" to "a lot"
export const countColors = {
  zero: '#8c8c8c',
  low: '#1677ff',
  medium: '#52c41a',
  high: '#fa8c16',
  top: '#ff4d4f',
} as const;

export const getCountColor = (count: number): string => {
  if (count === 0) return countColors.zero;
  if (count < 10) return countColors.low;
  if (count < 50) return countColors.medium;
  if (count < 100) return countColors.high;
  return countColors.top;
};

// Action button colors
export const actionColors = {
  increment: '#52c41a',
  batch: '#13c2c2',
  reset: '#fa8c16',
  set: '#722ed1',
} as const;

const sharedTokens = {
  colorPrimary: '#722ed1',
  colorSuccess: '#52c41a',
  colorWarning: '#faad14',
  colorError: '#ff4d4f',
  colorInfo: '#722ed1',
  borderRadius: 6,
  fontFamily: `-apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, 'Noto Sans', sans-serif, 'Apple Color Emoji', 'Segoe UI Emoji', 'Segoe UI Symbol', 'Noto Color Emoji'`,
};

export const lightTheme: ThemeConfig = {
  token: {
    ...sharedTokens,
    colorBgContainer: '#ffffff',
    colorBgLayout: '#f5f5f5',
  },
};

// Layout dimensions
export const layout = {
  headerHeight: 64,
  contentMaxWidth: 560,
} as const;
