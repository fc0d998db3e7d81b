import { cva, type VariantProps } from 'class-variance-authority'
import { cn } from '../../lib/utils'

const badgeVariants = cva(
  'inline-flex items-center gap-1 rounded-md border px-2 py-0.5 font-mono text-xs font-semibold',
  {
    variants: {
      variant: {
        default: 'border-primary/30 bg-primary/15 text-primary',
        success: 'border-secondary/30 bg-secondary/15 text-secondary',
        warning: 'border-amber-400/30 bg-amber-400/15 text-amber-200',
        destructive: 'border-red-500/30 bg-red-500/15 text-red-300',
        outline: 'border-slate-600/60 bg-transparent text-slate-300',
      },
    },
    defaultVariants: {
      variant: 'default',
    },
  },
)

export interface BadgeProps
  extends React.HTMLAttributes<HTMLSpanElement>,
    VariantProps<typeof badgeVariants> {}

export const Badge = ({ className, variant, ...props }: BadgeProps) => (
  <span className={cn(badgeVariants({ variant }), className)} {...props} />
)
