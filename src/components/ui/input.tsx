import { forwardRef } from 'react'
import { cn } from '../../lib/utils'

const fieldClasses =
  'w-full rounded-lg border border-slate-700/70 bg-slate-950/70 px-3 py-2 font-mono text-sm text-white placeholder:text-slate-500 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-primary aria-[invalid=true]:border-red-500/70'

export const Input = forwardRef<HTMLInputElement, React.InputHTMLAttributes<HTMLInputElement>>(
  ({ className, type = 'text', ...props }, ref) => (
    <input type={type} className={cn(fieldClasses, 'h-10', className)} ref={ref} {...props} />
  ),
)

Input.displayName = 'Input'

export const Textarea = forwardRef<HTMLTextAreaElement, React.TextareaHTMLAttributes<HTMLTextAreaElement>>(
  ({ className, rows = 5, ...props }, ref) => (
    <textarea rows={rows} className={cn(fieldClasses, 'resize-y', className)} ref={ref} {...props} />
  ),
)

Textarea.displayName = 'Textarea'
