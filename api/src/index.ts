import express from 'express'
import cors from 'cors'
import dotenv from 'dotenv'
import { extractRouter } from './extract.js'

dotenv.config()

const app = express()
const PORT = parseInt(process.env.PORT ?? '3001', 10)
const BODY_LIMIT = process.env.API_BODY_LIMIT ?? '50mb'

const allowedOrigin = process.env.CORS_ORIGIN
app.use(cors(allowedOrigin ? { origin: allowedOrigin } : undefined))
app.use(express.json({ limit: BODY_LIMIT }))

app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() })
})

app.use('/api', extractRouter)

app.listen(PORT, () => {
  console.log(`Dump extractor API listening on port ${PORT}`)
})
