import type { Matrix } from '../lib/adfgvx'
import { cn } from '../lib/utils'

interface MatrixGridProps {
  matrix: Matrix
  title: string
  caption?: string
  /** Show the 1-based sorted rank of each key character above the key row. */
  ranks?: number[]
}

// Row 0 is the key row and is drawn as a header.
export const MatrixGrid = ({ matrix, title, caption, ranks }: MatrixGridProps) => {
  const [header = [], ...body] = matrix
  return (
    <figure className="space-y-2">
      <figcaption className="text-xs uppercase tracking-wide text-slate-400">{title}</figcaption>
      <div className="overflow-x-auto">
        <table className="border-separate border-spacing-1 font-mono text-sm">
          <thead>
            {ranks && (
              <tr>
                {ranks.map((rank, column) => (
                  <th key={column} className="text-[10px] font-normal text-slate-500">
                    {rank}
                  </th>
                ))}
              </tr>
            )}
            <tr>
              {header.map((cell, column) => (
                <th key={column} className="h-8 w-8 rounded bg-primary/20 text-primary">
                  {cell}
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {body.map((row, rowIndex) => (
              <tr key={rowIndex}>
                {row.map((cell, column) => (
                  <td
                    key={column}
                    className={cn('h-8 w-8 rounded text-center', cell ? 'bg-slate-800/70 text-slate-100' : 'bg-slate-900/40')}
                  >
                    {cell}
                  </td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
      </div>
      {caption && <p className="text-xs text-slate-500">{caption}</p>}
      {!body.length && <p className="text-xs text-amber-300">Not enough symbols to fill a single row.</p>}
    </figure>
  )
}
