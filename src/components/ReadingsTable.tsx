import { Download } from 'lucide-react';
import type { Reading } from '../types';
import { formatTimestamp } from '../lib/dateUtils';

interface ReadingsTableProps {
    readings: Reading[];
    onDownload?: () => void;
}

export function ReadingsTable({ readings, onDownload }: ReadingsTableProps) {
    // Newest first.
    const rows = [...readings].reverse();

    return (
        <div className="bg-card border border-border rounded-lg shadow-sm">
            <div className="flex items-center justify-between p-3 border-b border-border">
                <span className="text-sm text-muted-foreground">{readings.length} readings</span>
                {onDownload && (
                    <button
                        type="button"
                        onClick={onDownload}
                        disabled={readings.length === 0}
                        className="px-3 py-1.5 bg-primary text-primary-foreground rounded-md hover:bg-primary/90 disabled:opacity-50 transition-colors flex items-center gap-2 text-sm"
                    >
                        <Download className="h-4 w-4" />
                        Download CSV
                    </button>
                )}
            </div>
            <div className="max-h-96 overflow-y-auto">
                <table className="w-full text-sm">
                    <thead className="sticky top-0 bg-card">
                        <tr className="text-left text-muted-foreground">
                            <th className="px-3 py-2 font-medium">Date &amp; Time (UTC)</th>
                            <th className="px-3 py-2 font-medium text-right">Value</th>
                            <th className="px-3 py-2 font-medium">Unit</th>
                        </tr>
                    </thead>
                    <tbody>
                        {rows.map((r, i) => (
                            <tr key={`${r.timestamp}-${i}`} className="border-t border-border">
                                <td className="px-3 py-1.5 font-mono">{formatTimestamp(r.timestamp)}</td>
                                <td className="px-3 py-1.5 text-right font-mono">{r.value}</td>
                                <td className="px-3 py-1.5">{r.unit}</td>
                            </tr>
                        ))}
                    </tbody>
                </table>
            </div>
        </div>
    );
}
