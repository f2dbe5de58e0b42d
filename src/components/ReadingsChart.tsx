import { ResponsiveContainer, LineChart, Line, XAxis, YAxis, CartesianGrid, Tooltip, Brush } from 'recharts';
import type { MeasureSeries } from '../lib/stats';
import { summarizeReadings } from '../lib/stats';
import { formatAxisTime, formatTimestamp } from '../lib/dateUtils';

interface ChartProps {
    series: MeasureSeries;
}

const formatValue = (value: number, unit: string) => `${value.toFixed(2)}${unit ? ` ${unit}` : ''}`;

export function ReadingsChart({ series }: ChartProps) {
    const summary = summarizeReadings(series.readings);

    if (!summary) {
        return (
            <div className="h-64 flex items-center justify-center text-muted-foreground border border-dashed border-border rounded-lg bg-muted/10">
                No {series.label.toLowerCase()} readings in this window
            </div>
        );
    }

    const unit = summary.unit || 'units unknown';
    const chartData = series.readings.map(r => ({ timestamp: r.timestamp, value: r.value }));

    return (
        <div className="bg-card border border-border rounded-lg p-4 shadow-sm space-y-4">
            <h3 className="text-lg font-semibold">
                {series.label} <span className="text-sm font-normal text-muted-foreground">({unit})</span>
            </h3>

            {summary.units.length > 1 && (
                <p className="text-sm text-amber-700 bg-amber-50 border border-amber-200 rounded-md px-3 py-2">
                    Mixed units in this series: {summary.units.join(', ')}. Values are shown as reported.
                </p>
            )}

            <div className="h-[320px] w-full">
                <ResponsiveContainer width="100%" height="100%">
                    <LineChart data={chartData}>
                        <CartesianGrid strokeDasharray="3 3" opacity={0.2} />
                        <XAxis dataKey="timestamp" tick={{ fontSize: 12 }} tickFormatter={formatAxisTime} minTickGap={30} />
                        <YAxis tick={{ fontSize: 12 }} width={50} domain={['auto', 'auto']} tickFormatter={(val) => Number(val).toFixed(2)} />
                        <Tooltip
                            labelFormatter={(label) => `${formatTimestamp(String(label))} UTC`}
                            formatter={(value) => [formatValue(Number(value), summary.unit), series.label]}
                        />
                        <Line type="monotone" dataKey="value" stroke="hsl(var(--primary))" dot={false} isAnimationActive={false} />
                        {chartData.length > 20 && <Brush dataKey="timestamp" height={20} tickFormatter={formatAxisTime} />}
                    </LineChart>
                </ResponsiveContainer>
            </div>

            <dl className="grid grid-cols-2 md:grid-cols-4 gap-3 text-sm">
                <div className="p-3 rounded-lg border border-border">
                    <dt className="text-muted-foreground text-xs">Latest Value</dt>
                    <dd className="font-mono text-lg">{formatValue(summary.latest, summary.unit)}</dd>
                </div>
                <div className="p-3 rounded-lg border border-border">
                    <dt className="text-muted-foreground text-xs">Average</dt>
                    <dd className="font-mono text-lg">{formatValue(summary.mean, summary.unit)}</dd>
                </div>
                <div className="p-3 rounded-lg border border-border">
                    <dt className="text-muted-foreground text-xs">Min</dt>
                    <dd className="font-mono text-lg">{formatValue(summary.min, summary.unit)}</dd>
                </div>
                <div className="p-3 rounded-lg border border-border">
                    <dt className="text-muted-foreground text-xs">Max</dt>
                    <dd className="font-mono text-lg">{formatValue(summary.max, summary.unit)}</dd>
                </div>
            </dl>
        </div>
    );
}
