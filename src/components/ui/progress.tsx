import { cn } from '../../lib/utils'

interface ProgressProps extends React.HTMLAttributes<HTMLDivElement> {
  /** 0–100 */
  value: number
}

export const Progress = ({ className, value, ...props }: ProgressProps) => {
  const clamped = Math.min(100, Math.max(0, value))
  return (
    <div
      role="progressbar"
      aria-valuemin={0}
      aria-valuemax={100}
      aria-valuenow={Math.round(clamped)}
      className={cn('h-2 w-full overflow-hidden rounded-full bg-slate-800/70', className)}
      {...props}
    >
      <div
        className="h-full rounded-full bg-gradient-to-r from-primary to-secondary transition-all duration-300"
        style={{ width: `${clamped}%` }}
      />
    </div>
  )
}
