import { ADFGVX, POLYBIUS_SQUARE } from '../lib/polybius'
import { cn } from '../lib/utils'

interface PolybiusGridProps {
  /** Characters to highlight, e.g. the plaintext being encoded. */
  highlight?: string
}

export const PolybiusGrid = ({ highlight = '' }: PolybiusGridProps) => {
  const marked = new Set(highlight.split(''))
  return (
    <table className="border-separate border-spacing-1 font-mono text-sm">
      <thead>
        <tr>
          <th />
          {ADFGVX.map((symbol) => (
            <th key={symbol} className="h-8 w-8 text-secondary">
              {symbol}
            </th>
          ))}
        </tr>
      </thead>
      <tbody>
        {POLYBIUS_SQUARE.map((row, rowIndex) => (
          <tr key={ADFGVX[rowIndex]}>
            <th className="h-8 w-8 text-secondary">{ADFGVX[rowIndex]}</th>
            {row.map((cell) => (
              <td
                key={cell}
                className={cn(
                  'h-8 w-8 rounded text-center',
                  marked.has(cell) ? 'bg-primary/30 text-white' : 'bg-slate-800/60 text-slate-300',
                )}
              >
                {cell}
              </td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  )
}
