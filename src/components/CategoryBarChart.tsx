import { useMemo } from 'react';
import * as d3 from 'd3';
import { layoutBars, hasChartData } from '../domain/chartSeries';
import type { ChartSeries } from '../domain/types';

interface CategoryBarChartProps {
  series: ChartSeries | null;
}

const WIDTH = 760;
const HEIGHT = 420;
const MARGIN = { top: 24, right: 16, bottom: 96, left: 72 };

const COLORS = {
  income: 'green',
  expense: 'red',
} as const;

const LEGEND = {
  income: 'รายรับ',
  expense: 'รายจ่าย',
} as const;

const axisFmt = d3.format(',.0f');

export function CategoryBarChart({ series }: CategoryBarChartProps) {
  const layout = useMemo(() => (series && hasChartData(series) ? layoutBars(series) : null), [series]);

  if (!layout) {
    return (
      <section className="chart-card" aria-label="กราฟรายรับ-รายจ่าย">
        <h2>📈 กราฟรายรับ-รายจ่าย</h2>
        <p className="no-data">ไม่มีข้อมูลเพียงพอสำหรับสร้างกราฟ</p>
      </section>
    );
  }

  const innerWidth = WIDTH - MARGIN.left - MARGIN.right;
  const innerHeight = HEIGHT - MARGIN.top - MARGIN.bottom;

  // Category i sits at x = i; pad half a unit on both ends
  const x = d3.scaleLinear().domain([-0.5, layout.ticks.length - 0.5]).range([0, innerWidth]);
  const y = d3.scaleLinear().domain([0, layout.maxValue || 1]).nice().range([innerHeight, 0]);
  const unit = x(1) - x(0);

  return (
    <section className="chart-card" aria-label="กราฟรายรับ-รายจ่าย">
      <h2>📈 กราฟรายรับ-รายจ่าย</h2>
      <svg viewBox={`0 0 ${WIDTH} ${HEIGHT}`} className="category-chart" role="img">
        <g transform={`translate(${MARGIN.left},${MARGIN.top})`}>
          {y.ticks(5).map((tick) => (
            <g key={tick} transform={`translate(0,${y(tick)})`}>
              <line x2={innerWidth} className="grid-line" />
              <text x={-8} dy="0.32em" textAnchor="end" className="axis-label">
                {axisFmt(tick)}
              </text>
            </g>
          ))}

          {layout.bars.map((bar) => {
            const left = x(bar.x) - (bar.width * unit) / 2;
            const top = y(bar.value);
            return (
              <g key={`${bar.kind}-${bar.category}`}>
                <rect
                  x={left}
                  y={top}
                  width={bar.width * unit}
                  height={innerHeight - top}
                  fill={COLORS[bar.kind]}
                />
                {bar.label && (
                  <text x={x(bar.x)} y={top - 4} textAnchor="middle" className="bar-label">
                    {bar.label}
                  </text>
                )}
              </g>
            );
          })}

          <line y1={innerHeight} y2={innerHeight} x2={innerWidth} className="axis-line" />
          {layout.ticks.map((tick) => (
            <text
              key={tick.label}
              transform={`translate(${x(tick.x)},${innerHeight + 12}) rotate(-45)`}
              textAnchor="end"
              className="axis-label"
            >
              {tick.label || '(ไม่ระบุ)'}
            </text>
          ))}

          <text x={-MARGIN.left + 16} y={innerHeight / 2} transform={`rotate(-90,${-MARGIN.left + 16},${innerHeight / 2})`} textAnchor="middle" className="axis-title">
            จำนวนเงิน (บาท)
          </text>
        </g>

        <g transform={`translate(${WIDTH - MARGIN.right - 120},${MARGIN.top})`}>
          {(['income', 'expense'] as const).map((kind, i) => (
            <g key={kind} transform={`translate(0,${i * 20})`}>
              <rect width={12} height={12} fill={COLORS[kind]} />
              <text x={18} y={10} className="legend-label">{LEGEND[kind]}</text>
            </g>
          ))}
        </g>
      </svg>
    </section>
  );
}
