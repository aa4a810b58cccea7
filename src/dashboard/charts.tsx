import {
  Bar,
  BarChart,
  CartesianGrid,
  Line,
  LineChart,
  XAxis,
  YAxis,
} from "recharts";
import type { MonthlySummary } from "./summary";

// Server-rendered charts need fixed dimensions; ResponsiveContainer measures the DOM
export const CHART_WIDTH = 560;
export const CHART_HEIGHT = 300;

export const chartColors = {
  profit: "#2563eb",
  orders: "#16a34a",
  grid: "#e5e7eb",
} as const;

const margin = { top: 16, right: 24, bottom: 8, left: 8 };

export interface MonthlyChartProps {
  /** Monthly summary, ascending by month */
  data: MonthlySummary[];
  width?: number;
  height?: number;
}

export function ProfitChart({
  data,
  width = CHART_WIDTH,
  height = CHART_HEIGHT,
}: MonthlyChartProps) {
  return (
    <LineChart width={width} height={height} data={data} margin={margin}>
      <CartesianGrid strokeDasharray="3 3" stroke={chartColors.grid} />
      <XAxis dataKey="month" />
      <YAxis />
      <Line
        type="monotone"
        dataKey="profit"
        name="Profit"
        stroke={chartColors.profit}
        strokeWidth={2}
        isAnimationActive={false}
      />
    </LineChart>
  );
}

export function OrdersChart({
  data,
  width = CHART_WIDTH,
  height = CHART_HEIGHT,
}: MonthlyChartProps) {
  return (
    <BarChart width={width} height={height} data={data} margin={margin}>
      <CartesianGrid strokeDasharray="3 3" stroke={chartColors.grid} />
      <XAxis dataKey="month" />
      <YAxis allowDecimals={false} />
      <Bar
        dataKey="totalOrders"
        name="Total Orders"
        fill={chartColors.orders}
        isAnimationActive={false}
      />
    </BarChart>
  );
}
