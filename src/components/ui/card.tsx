import { cn } from '../../lib/utils'

type DivProps = React.HTMLAttributes<HTMLDivElement>

export const Card = ({ className, ...props }: DivProps) => (
  <section
    className={cn('rounded-xl border border-slate-800/80 bg-surface/80 p-5 shadow-lg shadow-black/20', className)}
    {...props}
  />
)

export const CardHeader = ({ className, ...props }: DivProps) => (
  <div className={cn('mb-4 flex flex-wrap items-start justify-between gap-2', className)} {...props} />
)

export const CardTitle = ({ className, ...props }: React.HTMLAttributes<HTMLHeadingElement>) => (
  <h2 className={cn('text-lg font-semibold text-white', className)} {...props} />
)

export const CardDescription = ({ className, ...props }: React.HTMLAttributes<HTMLParagraphElement>) => (
  <p className={cn('text-sm text-slate-400', className)} {...props} />
)

export const CardContent = ({ className, ...props }: DivProps) => (
  <div className={cn('space-y-3', className)} {...props} />
)
