import { useEffect, useMemo, useState } from 'react'
import {
  AlertTriangle,
  Copy,
  Download,
  FileText,
  GraduationCap,
  Grid3x3,
  KeyRound,
  Play,
  RefreshCw,
  Upload,
  Workflow,
} from 'lucide-react'
import {
  ADFGVX_PRESETS,
  adfgvx_decrypt,
  adfgvx_encrypt,
  describeCipherError,
  type ADFGVXResult,
  type CipherMode,
  type PresetId,
} from './lib/adfgvx'
import { MAX_KEY_LENGTH, MIN_KEY_LENGTH, buildKeySchedule, randomKey } from './lib/keySchedule'
import { cleanCiphertext, cleanPlaintext, groupBlocks } from './lib/text'
import { cn } from './lib/utils'
import { runBatch, describeBatchError, type BatchFile, type BatchOutput } from './services/batch'
import { diagnoseADFGVXSubmission, type DiagnosisResult } from './services/diagnostics'
import { STORAGE_KEYS } from './config'
import { Badge } from './components/ui/badge'
import { Button } from './components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from './components/ui/card'
import { Input, Textarea } from './components/ui/input'
import { Progress } from './components/ui/progress'
import { MatrixGrid } from './components/MatrixGrid'
import { PipelineDiagram } from './components/PipelineDiagram'
import { PolybiusGrid } from './components/PolybiusGrid'

type TabId = 'cipher' | 'schedule' | 'square' | 'batch' | 'grading'

const TABS: TabId[] = ['cipher', 'schedule', 'square', 'batch', 'grading']

const PRESET_IDS: PresetId[] = ['classic', 'digits', 'lossy']

const TAB_LABELS: Record<TabId, string> = {
  cipher: 'Cipher',
  schedule: 'Key Schedule',
  square: 'Polybius Square',
  batch: 'Batch Files',
  grading: 'Error Detection',
}

const TAB_ICONS: Record<TabId, typeof Play> = {
  cipher: Workflow,
  schedule: KeyRound,
  square: Grid3x3,
  batch: FileText,
  grading: GraduationCap,
}

interface SavedInputs {
  keyValue?: string
  textInput?: string
  mode?: CipherMode
}

const isCipherMode = (value: unknown): value is CipherMode => value === 'encrypt' || value === 'decrypt'

const loadSavedInputs = (): SavedInputs => {
  try {
    const raw = localStorage.getItem(STORAGE_KEYS.inputs)
    if (!raw) return {}
    const parsed: unknown = JSON.parse(raw)
    if (typeof parsed !== 'object' || parsed === null) return {}
    const saved: SavedInputs = {}
    if ('keyValue' in parsed && typeof parsed.keyValue === 'string') saved.keyValue = parsed.keyValue
    if ('textInput' in parsed && typeof parsed.textInput === 'string') saved.textInput = parsed.textInput
    if ('mode' in parsed && isCipherMode(parsed.mode)) saved.mode = parsed.mode
    return saved
  } catch (storageError) {
    console.warn('Unable to load saved inputs', storageError)
    return {}
  }
}

const downloadTextFile = (content: string, filename: string) => {
  const blob = new Blob([content], { type: 'text/plain' })
  const url = URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  a.click()
  URL.revokeObjectURL(url)
}

// 1-based sorted rank of each original key column
const rankColumns = (originalIndices: number[]) => originalIndices.map((index) => index + 1)

// Main App component: holds the key and text, runs ADFGVX, and renders the teaching views
function App() {
  const [saved] = useState(loadSavedInputs)
  const [keyValue, setKeyValue] = useState<string>(saved.keyValue ?? ADFGVX_PRESETS.classic.key)
  const [textInput, setTextInput] = useState<string>(saved.textInput ?? ADFGVX_PRESETS.classic.plaintext)
  const [mode, setMode] = useState<CipherMode>(saved.mode ?? 'encrypt')
  const [activeTab, setActiveTab] = useState<TabId>('cipher')
  const [result, setResult] = useState<ADFGVXResult | null>(null)
  const [error, setError] = useState<string | null>(null)
  const [executionTime, setExecutionTime] = useState<number | null>(null)

  const [batchFiles, setBatchFiles] = useState<BatchFile[]>([])
  const [batchMode, setBatchMode] = useState<CipherMode>('encrypt')
  const [batchOutputs, setBatchOutputs] = useState<BatchOutput[]>([])
  const [batchProgress, setBatchProgress] = useState<number>(0)
  const [batchError, setBatchError] = useState<string | null>(null)

  const [studentAnswer, setStudentAnswer] = useState<string>('')
  const [diagnosis, setDiagnosis] = useState<DiagnosisResult | null>(null)
  const [gradingError, setGradingError] = useState<string | null>(null)

  // Persist inputs
  useEffect(() => {
    try {
      localStorage.setItem(STORAGE_KEYS.inputs, JSON.stringify({ keyValue, textInput, mode }))
    } catch (storageError) {
      console.warn('Unable to save inputs', storageError)
    }
  }, [keyValue, textInput, mode])

  const keySchedule = useMemo(() => buildKeySchedule(keyValue), [keyValue])
  const keyMessage = keySchedule.ok ? null : describeCipherError(keySchedule.error)

  const cleanedInput = useMemo(
    () => (mode === 'encrypt' ? cleanPlaintext(textInput) : cleanCiphertext(textInput)),
    [mode, textInput],
  )
  const removedCount = textInput.replace(/\r?\n/g, '').length - cleanedInput.length
  const symbolCount = mode === 'encrypt' ? cleanedInput.length * 2 : cleanedInput.length
  const pendingTruncation = keyValue.length ? symbolCount % keyValue.length : 0

  const loadPreset = (id: PresetId) => {
    const preset = ADFGVX_PRESETS[id]
    setKeyValue(preset.key)
    setTextInput(preset.plaintext)
    setMode('encrypt')
    setResult(null)
    setError(null)
  }

  const handleRun = () => {
    const started = performance.now()
    const outcome = mode === 'encrypt' ? adfgvx_encrypt(cleanedInput, keyValue) : adfgvx_decrypt(cleanedInput, keyValue)
    setExecutionTime(performance.now() - started)
    if (!outcome.ok) {
      setResult(null)
      setError(describeCipherError(outcome.error))
      return
    }
    setError(null)
    setResult(outcome.value)
  }

  // Feed the output back in for the opposite direction
  const handleSwap = () => {
    if (!result) return
    setTextInput(result.output)
    setMode(result.mode === 'encrypt' ? 'decrypt' : 'encrypt')
    setResult(null)
  }

  const handleCopy = () => {
    if (!result) return
    navigator.clipboard.writeText(result.output).catch((copyError: unknown) => {
      console.warn('Clipboard write failed', copyError)
    })
  }

  const handleFilesSelected = async (fileList: FileList | null) => {
    if (!fileList) return
    const files = Array.from(fileList)
    setBatchOutputs([])
    setBatchError(null)
    setBatchProgress(0)
    const loaded: BatchFile[] = []
    try {
      for (const file of files) {
        loaded.push({ name: file.name, content: await file.text() })
        setBatchProgress((loaded.length / files.length) * 50)
      }
      setBatchFiles(loaded)
    } catch (readError) {
      setBatchFiles([])
      setBatchError(readError instanceof Error ? readError.message : 'Unable to read the selected files.')
    }
  }

  const handleRunBatch = () => {
    const outcome = runBatch(batchFiles, batchMode, keyValue, {
      existingNames: batchOutputs.map((output) => output.name),
      onProgress: (done, total) => setBatchProgress(50 + (done / total) * 50),
    })
    if (!outcome.ok) {
      setBatchError(describeBatchError(outcome.error))
      return
    }
    setBatchError(null)
    setBatchOutputs((previous) => [...previous, ...outcome.value])
  }

  const handleDiagnose = () => {
    if (mode !== 'encrypt') {
      setGradingError('Switch to encrypt mode: diagnostics compare against the expected ciphertext.')
      return
    }
    if (!studentAnswer.trim()) {
      setGradingError('Enter the student ciphertext.')
      return
    }
    const outcome = diagnoseADFGVXSubmission({ plaintext: textInput, key: keyValue, studentCiphertext: studentAnswer })
    if (!outcome.ok) {
      setDiagnosis(null)
      setGradingError(describeCipherError(outcome.error))
      return
    }
    setGradingError(null)
    setDiagnosis(outcome.value)
  }

  return (
    <div className="min-h-screen bg-slate-950 text-slate-50">
      <header className="border-b border-slate-800/60 bg-slate-900/70 px-4 py-4 backdrop-blur">
        <div className="mx-auto flex max-w-7xl flex-wrap items-center justify-between gap-3">
          <div className="space-y-1">
            <p className="text-xs uppercase tracking-[0.25em] text-slate-400">Interactive ADFGVX Lab</p>
            <h1 className="text-2xl font-bold text-white">Polybius Substitution + Columnar Transposition</h1>
          </div>
          <div className="flex flex-wrap items-center gap-2">
            <Badge variant={mode === 'encrypt' ? 'default' : 'success'}>{mode === 'encrypt' ? 'Encrypt' : 'Decrypt'}</Badge>
            <Badge variant="outline">Key: {MIN_KEY_LENGTH}–{MAX_KEY_LENGTH} chars</Badge>
          </div>
        </div>
      </header>

      <main className="mx-auto grid max-w-7xl gap-6 px-4 py-6 lg:grid-cols-[360px_1fr]">
        <aside className="space-y-4 rounded-xl border border-slate-800/80 bg-slate-900/70 p-4">
          <h2 className="text-lg font-semibold text-white">Inputs</h2>

          <div className="flex gap-2">
            <Button size="sm" variant={mode === 'encrypt' ? 'default' : 'outline'} onClick={() => setMode('encrypt')}>
              Encrypt
            </Button>
            <Button size="sm" variant={mode === 'decrypt' ? 'secondary' : 'outline'} onClick={() => setMode('decrypt')}>
              Decrypt
            </Button>
          </div>

          <label className="block space-y-1 text-sm">
            <span className="font-semibold">Key</span>
            <div className="flex gap-2">
              <Input
                value={keyValue}
                onChange={(event) => setKeyValue(event.target.value)}
                aria-invalid={!keySchedule.ok}
                placeholder="5–16 distinct letters or digits"
              />
              <Button size="sm" variant="ghost" aria-label="Generate random key" onClick={() => setKeyValue(randomKey())}>
                <RefreshCw size={14} />
              </Button>
            </div>
            <span className={cn('text-xs', keyMessage ? 'text-red-300' : 'text-slate-400')}>
              {keyMessage ?? `Sorted: ${keySchedule.ok ? keySchedule.value.sortedKey : ''}`}
            </span>
          </label>

          <label className="block space-y-1 text-sm">
            <span className="font-semibold">{mode === 'encrypt' ? 'Plaintext' : 'Ciphertext'}</span>
            <Textarea value={textInput} onChange={(event) => setTextInput(event.target.value)} />
            <span className="block text-xs text-slate-400">
              {cleanedInput.length} usable characters
              {removedCount > 0 && `, ${removedCount} removed during cleaning`}
            </span>
            {pendingTruncation > 0 && keySchedule.ok && (
              <span className="flex items-center gap-1 text-xs text-amber-300">
                <AlertTriangle size={12} />
                {pendingTruncation} trailing symbol{pendingTruncation === 1 ? '' : 's'} will not fit the matrix and will be
                dropped.
              </span>
            )}
          </label>

          <div className="flex flex-wrap gap-2">
            <Button onClick={handleRun} disabled={!keySchedule.ok}>
              <Play size={14} /> Run
            </Button>
            <Button variant="outline" onClick={handleSwap} disabled={!result}>
              Use output as input
            </Button>
          </div>

          <div className="space-y-2">
            <p className="text-xs uppercase tracking-wide text-slate-400">Presets</p>
            {PRESET_IDS.map((id) => (
              <button
                key={id}
                type="button"
                onClick={() => loadPreset(id)}
                className="block w-full rounded-lg border border-slate-800 bg-slate-950/50 p-2 text-left text-xs hover:border-primary/40"
              >
                <span className="font-semibold text-slate-100">{ADFGVX_PRESETS[id].label}</span>
                <span className="block text-slate-400">{ADFGVX_PRESETS[id].description}</span>
              </button>
            ))}
          </div>
        </aside>

        <section className="space-y-4">
          <nav className="flex flex-wrap gap-2">
            {TABS.map((tab) => {
              const Icon = TAB_ICONS[tab]
              return (
                <Button
                  key={tab}
                  size="sm"
                  variant={activeTab === tab ? 'default' : 'ghost'}
                  onClick={() => setActiveTab(tab)}
                >
                  <Icon size={14} />
                  {TAB_LABELS[tab]}
                </Button>
              )
            })}
          </nav>

          {activeTab === 'cipher' && (
            <Card>
              <CardHeader>
                <div>
                  <CardTitle>{mode === 'encrypt' ? 'Encryption' : 'Decryption'} pipeline</CardTitle>
                  <CardDescription>
                    {mode === 'encrypt'
                      ? 'Substitute through the square, write rows under the key, sort the columns, read them out.'
                      : 'Write columns under the sorted key, restore key order, read rows, decode pairs.'}
                  </CardDescription>
                </div>
                {executionTime !== null && <Badge variant="outline">{executionTime.toFixed(2)} ms</Badge>}
              </CardHeader>
              <CardContent>
                <PipelineDiagram mode={mode} />
                {error && (
                  <p className="flex items-center gap-2 rounded-lg border border-red-500/40 bg-red-500/10 p-3 text-sm text-red-200">
                    <AlertTriangle size={16} /> {error}
                  </p>
                )}
                {result && (
                  <>
                    <div className="space-y-1">
                      <div className="flex items-center justify-between">
                        <span className="text-sm font-semibold">Output</span>
                        <Button size="sm" variant="ghost" onClick={handleCopy}>
                          <Copy size={14} /> Copy
                        </Button>
                      </div>
                      <p className="break-all rounded-lg bg-slate-950/70 p-3 font-mono text-sm">
                        {groupBlocks(result.output) || '—'}
                      </p>
                      <div className="flex flex-wrap gap-2">
                        {result.truncated > 0 && (
                          <Badge variant="warning">
                            {result.truncated} {result.mode === 'encrypt' ? 'symbols' : 'characters'} truncated
                          </Badge>
                        )}
                        {result.droppedSymbol && <Badge variant="warning">odd symbol dropped</Badge>}
                        <Badge variant="outline">id {result.id.slice(0, 8)}</Badge>
                      </div>
                    </div>
                    <p className="break-all font-mono text-xs text-slate-400">
                      Symbols: {groupBlocks(result.symbols, 2)}
                    </p>
                    <div className="grid gap-4 md:grid-cols-2">
                      <MatrixGrid
                        title={result.mode === 'encrypt' ? 'Rows under the key' : 'Columns under the sorted key'}
                        matrix={result.matrix}
                        ranks={result.mode === 'encrypt' ? rankColumns(result.schedule.originalIndices) : undefined}
                      />
                      <MatrixGrid
                        title={result.mode === 'encrypt' ? 'Columns in sorted order' : 'Columns restored to key order'}
                        matrix={result.reorderedMatrix}
                        caption={result.mode === 'encrypt' ? 'Read top to bottom, left to right.' : 'Read left to right, top to bottom.'}
                      />
                    </div>
                  </>
                )}
              </CardContent>
            </Card>
          )}

          {activeTab === 'schedule' && (
            <Card>
              <CardHeader>
                <div>
                  <CardTitle>Key schedule</CardTitle>
                  <CardDescription>Column order comes from sorting the key by character code.</CardDescription>
                </div>
              </CardHeader>
              <CardContent>
                {keySchedule.ok ? (
                  <table className="font-mono text-sm">
                    <tbody>
                      {(
                        [
                          ['Original key', keySchedule.value.originalKey.split('')],
                          ['Sorted key', keySchedule.value.sortedKey.split('')],
                          ['Sorted ← original column', keySchedule.value.sortedIndices],
                          ['Original ← sorted column', keySchedule.value.originalIndices],
                        ] satisfies [string, (string | number)[]][]
                      ).map(([label, cells]) => (
                        <tr key={label}>
                          <th className="pr-4 text-left text-xs font-normal text-slate-400">{label}</th>
                          {cells.map((cell, index) => (
                            <td key={index} className="h-8 w-8 text-center">
                              {cell}
                            </td>
                          ))}
                        </tr>
                      ))}
                    </tbody>
                  </table>
                ) : (
                  <p className="text-sm text-red-300">{keyMessage}</p>
                )}
              </CardContent>
            </Card>
          )}

          {activeTab === 'square' && (
            <Card>
              <CardHeader>
                <div>
                  <CardTitle>Polybius square</CardTitle>
                  <CardDescription>Each character becomes its row label followed by its column label.</CardDescription>
                </div>
              </CardHeader>
              <CardContent>
                <PolybiusGrid highlight={mode === 'encrypt' ? cleanedInput : result?.output ?? ''} />
              </CardContent>
            </Card>
          )}

          {activeTab === 'batch' && (
            <Card>
              <CardHeader>
                <div>
                  <CardTitle>Batch files</CardTitle>
                  <CardDescription>Process several text files with the current key.</CardDescription>
                </div>
                <div className="flex gap-2">
                  <Button
                    size="sm"
                    variant={batchMode === 'encrypt' ? 'default' : 'outline'}
                    onClick={() => setBatchMode('encrypt')}
                  >
                    Encrypt
                  </Button>
                  <Button
                    size="sm"
                    variant={batchMode === 'decrypt' ? 'secondary' : 'outline'}
                    onClick={() => setBatchMode('decrypt')}
                  >
                    Decrypt
                  </Button>
                </div>
              </CardHeader>
              <CardContent>
                <Button asChild variant="outline" className="w-full cursor-pointer justify-start border-dashed p-4">
                  <label>
                    <Upload size={16} />
                    <span>{batchFiles.length ? `${batchFiles.length} file(s) loaded` : 'Choose .txt files'}</span>
                    <input
                      type="file"
                      multiple
                      accept=".txt,text/plain"
                      className="hidden"
                      onChange={(event) => {
                        void handleFilesSelected(event.target.files)
                      }}
                    />
                  </label>
                </Button>
                <Progress value={batchProgress} />
                <Button onClick={handleRunBatch} disabled={!batchFiles.length || !keySchedule.ok}>
                  <Play size={14} /> {batchMode === 'encrypt' ? 'Encrypt all' : 'Decrypt all'}
                </Button>
                {batchError && <p className="text-sm text-red-300">{batchError}</p>}
                {batchOutputs.length > 0 && (
                  <ul className="divide-y divide-slate-800 rounded-lg border border-slate-800">
                    {batchOutputs.map((output) => (
                      <li key={output.name} className="flex items-center justify-between gap-2 p-2 text-sm">
                        <span className="font-mono">
                          {output.source} → {output.name}
                        </span>
                        <span className="flex items-center gap-2">
                          {output.truncated > 0 && <Badge variant="warning">−{output.truncated}</Badge>}
                          <Button size="sm" variant="ghost" onClick={() => downloadTextFile(output.content, output.name)}>
                            <Download size={14} />
                          </Button>
                        </span>
                      </li>
                    ))}
                  </ul>
                )}
              </CardContent>
            </Card>
          )}

          {activeTab === 'grading' && (
            <Card>
              <CardHeader>
                <div>
                  <CardTitle>Error detection</CardTitle>
                  <CardDescription>
                    Compare a student's ciphertext for the current plaintext and key against common mistakes.
                  </CardDescription>
                </div>
              </CardHeader>
              <CardContent>
                <Textarea
                  rows={3}
                  value={studentAnswer}
                  onChange={(event) => setStudentAnswer(event.target.value)}
                  placeholder="Student ciphertext (spaces and case ignored)"
                />
                <Button onClick={handleDiagnose}>
                  <GraduationCap size={14} /> Diagnose
                </Button>
                {gradingError && <p className="text-sm text-red-300">{gradingError}</p>}
                {diagnosis && (
                  <div className="space-y-2 rounded-lg border border-slate-800 p-3 text-sm">
                    <div className="flex flex-wrap gap-2">
                      {diagnosis.tags.map((tag) => (
                        <Badge key={tag} variant={tag === 'correct' ? 'success' : 'outline'}>
                          {tag}
                        </Badge>
                      ))}
                      <Badge variant={diagnosis.score === 1 ? 'success' : 'warning'}>
                        Score {Math.round(diagnosis.score * 100)}%
                      </Badge>
                    </div>
                    <p>{diagnosis.message}</p>
                    <p className="font-mono text-xs text-slate-400">Expected: {groupBlocks(diagnosis.expectedOutput)}</p>
                    <p className="font-mono text-xs text-slate-400">Student: {groupBlocks(diagnosis.studentOutput)}</p>
                  </div>
                )}
              </CardContent>
            </Card>
          )}
        </section>
      </main>
    </div>
  )
}

export default App
